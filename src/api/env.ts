import type { RequestContext, Role } from '../utils/context.js';

/** Caller identity established by the auth middleware. */
export interface Principal {
  userId?: string;
  role: Exclude<Role, 'system'>;
}

export interface ApiEnv {
  Variables: {
    requestId: string;
    principal: Principal | null;
    ctx: RequestContext;
  };
}
