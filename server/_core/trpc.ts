import { initTRPC, TRPCError } from "@trpc/server";
import { UnknownAdapterError } from "../adapterRegistry";
import { InvalidCidrError } from "../networkScanner";

export type TrpcContext = Record<string, never>;

export function createContext(): TrpcContext {
  return {};
}

const t = initTRPC.context<TrpcContext>().create();

// Caller mistakes surfaced by the core become validation failures
const toTrpcErrors = t.middleware(async ({ next }) => {
  const result = await next();
  if (!result.ok) {
    const cause = result.error.cause;
    if (cause instanceof UnknownAdapterError || cause instanceof InvalidCidrError) {
      throw new TRPCError({ code: "BAD_REQUEST", message: cause.message, cause });
    }
  }
  return result;
});

export const router = t.router;
export const publicProcedure = t.procedure.use(toTrpcErrors);
export const createCallerFactory = t.createCallerFactory;
