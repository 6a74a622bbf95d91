import { Hono, type Context } from 'hono';
import { z } from 'zod';
import { ValidationError } from '../../utils/errors.js';
import type { PaymentService } from '../../services/payment-service.js';
import type { ApiEnv } from '../env.js';

const gatewaySchema = z.enum(['vnpay', 'momo']);

const stringify = (value: unknown): string =>
  typeof value === 'string' ? value : value === null || value === undefined ? '' : String(value);

/**
 * Gateway callbacks arrive as a query string (VNPay IPN and browser
 * returns), a JSON body (MoMo IPN) or a form post. All are flattened to
 * string parameters, which is what the signatures are computed over.
 */
async function callbackParams(c: Context<ApiEnv>): Promise<Record<string, string>> {
  const params: Record<string, string> = { ...c.req.query() };
  if (c.req.method !== 'POST') return params;

  const contentType = c.req.header('Content-Type') ?? '';
  if (contentType.includes('application/json')) {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw new ValidationError('invalid_json', 'Callback body is not valid JSON');
    }
    if (typeof body === 'object' && body !== null && !Array.isArray(body)) {
      for (const [key, value] of Object.entries(body)) params[key] = stringify(value);
    }
  } else if (contentType.includes('application/x-www-form-urlencoded') || contentType.includes('multipart/form-data')) {
    const form = await c.req.parseBody();
    for (const [key, value] of Object.entries(form)) {
      if (typeof value === 'string') params[key] = value;
    }
  }
  return params;
}

export function webhookRoutes(deps: { payments: PaymentService }): Hono<ApiEnv> {
  const router = new Hono<ApiEnv>();

  router.on(['GET', 'POST'], '/webhooks/:gateway', async (c) => {
    const gateway = gatewaySchema.safeParse(c.req.param('gateway'));
    if (!gateway.success) {
      throw new ValidationError('unknown_gateway', `Unknown payment gateway ${c.req.param('gateway')}`);
    }
    const response = await deps.payments.handleCallback(c.get('ctx'), gateway.data, await callbackParams(c));
    return c.json(response.body, response.httpStatus);
  });

  return router;
}
