import { initTRPC } from "@trpc/server";
import { z } from "zod";
import type { TRPCContext } from "../context.js";

const t = initTRPC.context<TRPCContext>().create();

export const scanRouter = t.router({
  /** Full area scan: every beacon and device heard, registered or not. */
  nearby: t.procedure
    .input(z.object({ duration: z.number().positive().max(60).default(10) }).optional())
    .query(({ ctx, input }) => {
      return ctx.scanner.listNearby(input?.duration ?? 10);
    }),
});
