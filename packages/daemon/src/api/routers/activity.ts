import { initTRPC } from "@trpc/server";
import { z } from "zod";
import type { TRPCContext } from "../context.js";

const t = initTRPC.context<TRPCContext>().create();

const activityType = z.enum([
  "token_detected",
  "gate_opened",
  "gate_closed",
  "token_registered",
  "token_updated",
  "token_unregistered",
  "config_updated",
  "error",
  "info",
]);

export const activityRouter = t.router({
  list: t.procedure
    .input(
      z
        .object({
          limit: z.number().int().min(1).max(1000).default(100),
          type: activityType.optional(),
        })
        .optional(),
    )
    .query(({ ctx, input }) => {
      return ctx.activity.getEntries(input?.limit ?? 100, input?.type);
    }),

  clear: t.procedure.mutation(({ ctx }) => {
    ctx.activity.clear();
    return { success: true };
  }),

  mode: t.procedure.query(({ ctx }) => {
    return { mode: ctx.activity.getMode() };
  }),

  setMode: t.procedure
    .input(z.object({ mode: z.enum(["suppress", "extended"]) }))
    .mutation(({ ctx, input }) => {
      ctx.activity.setMode(input.mode);
      ctx.settings.updateLogging({ activityMode: input.mode });
      ctx.eventBus.emit("settings:updated", {
        section: "logging",
        changes: { activityMode: input.mode },
        timestamp: Date.now(),
      });
      return { mode: input.mode };
    }),
});
