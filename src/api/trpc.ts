import { createHash, timingSafeEqual } from "node:crypto";
import { initTRPC, TRPCError } from "@trpc/server";
import type { AppContext } from "./context";

const t = initTRPC.context<AppContext>().create();

function digest(value: string): Buffer {
  return createHash("sha256").update(value).digest();
}

/** Constant-time token comparison. */
export function tokensMatch(expected: string, presented: string): boolean {
  return timingSafeEqual(digest(expected), digest(presented));
}

/**
 * Rejects the call unless the request carries the configured admin token.
 * With no admin token configured every guarded procedure is refused.
 */
const requireAdmin = t.middleware(({ ctx, next }) => {
  if (!ctx.adminToken) {
    throw new TRPCError({
      code: "FORBIDDEN",
      message: "control API disabled: no admin token configured",
    });
  }
  if (!ctx.requestToken || !tokensMatch(ctx.adminToken, ctx.requestToken)) {
    throw new TRPCError({ code: "UNAUTHORIZED", message: "admin token required" });
  }
  return next();
});

export const router = t.router;

/** Procedure factory for administrator-only queries and mutations. */
export const adminProcedure = t.procedure.use(requireAdmin);

/**
 * tRPC caller factory for calling procedures directly without HTTP transport.
 */
export const createCallerFactory = t.createCallerFactory;
