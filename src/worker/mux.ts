import type { z } from 'zod';
import type { Logger } from '../utils/logger.js';
import { SkipRetryError } from '../utils/errors.js';
import type { RequestContext } from '../utils/context.js';
import type { Span } from '../observability/index.js';
import type { TaskEnvelope } from '../queues/task.js';

export interface TaskContext {
  ctx: RequestContext;
  envelope: TaskEnvelope;
  logger: Logger;
  span: Span;
}

export type TaskHandler = (task: TaskContext) => Promise<void>;

/** Routes a task to the single handler registered for its type. */
export class TaskMux {
  private readonly handlers = new Map<string, TaskHandler>();

  handle(type: string, handler: TaskHandler): this {
    if (this.handlers.has(type)) {
      throw new Error(`Handler already registered for ${type}`);
    }
    this.handlers.set(type, handler);
    return this;
  }

  has(type: string): boolean {
    return this.handlers.has(type);
  }

  types(): string[] {
    return [...this.handlers.keys()].sort();
  }

  async dispatch(task: TaskContext): Promise<void> {
    const handler = this.handlers.get(task.envelope.type);
    if (!handler) {
      throw new SkipRetryError(`No handler registered for ${task.envelope.type}`);
    }
    await handler(task);
  }
}

/** Validate a task payload; a malformed one can never succeed, so it skips retries. */
export function payloadOf<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, envelope: TaskEnvelope): T {
  const parsed = schema.safeParse(envelope.payload);
  if (!parsed.success) {
    throw new SkipRetryError(
      `Invalid ${envelope.type} payload: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`
    );
  }
  return parsed.data;
}
