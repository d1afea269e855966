/**
 * tRPC Setup
 *
 * Context, procedures and shared input schemas. Reads are public; anything
 * that writes XP or badges is a service procedure, callable only by the
 * marketplace's own services with the shared `x-service-token`.
 */

import { initTRPC, TRPCError } from '@trpc/server';
import { timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { AppError } from './lib/errors';
import { toTRPCError } from './lib/errors/error-handler';
import { MAX_XP_AMOUNT, MIN_XP_AMOUNT } from './services/XPLedgerService';
import type { Services } from './container';

// ============================================================================
// CONTEXT
// ============================================================================

// A type alias, not an interface: the Hono adapter wants a plain record.
export type Context = {
  services: Services;
  isService: boolean;
  requestId: string | null;
};

function tokensMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function createContextFactory(services: Services, serviceToken: string) {
  return (opts: { req: Request }): Context => {
    const presented = opts.req.headers.get('x-service-token');
    return {
      services,
      isService: serviceToken !== '' && presented !== null && tokensMatch(presented, serviceToken),
      requestId: opts.req.headers.get('x-request-id'),
    };
  };
}

// ============================================================================
// TRPC INITIALIZATION
// ============================================================================

const t = initTRPC.context<Context>().create({
  errorFormatter: ({ shape }) => ({
    ...shape,
    data: {
      ...shape.data,
      stack: undefined,
    },
  }),
});

export const router = t.router;
export const createCallerFactory = t.createCallerFactory;

// Middleware: map domain errors to tRPC codes
const appErrors = t.middleware(async ({ next }) => {
  const result = await next();
  if (!result.ok) {
    const { cause } = result.error;
    if (cause instanceof AppError || result.error.code === 'INTERNAL_SERVER_ERROR') {
      throw toTRPCError(cause ?? result.error);
    }
  }
  return result;
});

export const publicProcedure = t.procedure.use(appErrors);

// Middleware: require an internal service caller
const isService = t.middleware(async ({ ctx, next }) => {
  if (!ctx.isService) {
    throw new TRPCError({
      code: 'UNAUTHORIZED',
      message: 'Service token required',
    });
  }
  return next();
});

export const serviceProcedure = publicProcedure.use(isService);

// ============================================================================
// INPUT SCHEMAS (Zod validation)
// ============================================================================

export const Schemas = {
  uuid: z.string().uuid(),

  userId: z.object({ userId: z.string().uuid() }),

  badgeType: z.enum(['first_order', 'top_seller', 'big_spender', 'early_bird', 'reviewer', 'referrer']),

  category: z.enum(['weekly_buyers', 'monthly_sellers']),

  addXP: z.object({
    userId: z.string().uuid(),
    amount: z
      .number()
      .int()
      .min(MIN_XP_AMOUNT)
      .max(MAX_XP_AMOUNT)
      .refine((n) => n !== 0, 'amount must be non-zero'),
    reason: z.string().min(1).max(255),
    reference: z.string().max(255).nullish(),
  }),

  xpHistory: z.object({
    userId: z.string().uuid(),
    limit: z.number().int().min(1).max(100).optional(),
    offset: z.number().int().min(0).optional(),
  }),

  money: z.union([z.number().nonnegative(), z.string().regex(/^\d+(\.\d{1,2})?$/)]),
};
