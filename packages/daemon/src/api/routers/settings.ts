import { initTRPC } from "@trpc/server";
import { z } from "zod";
import type { TRPCContext } from "../context.js";

const t = initTRPC.context<TRPCContext>().create();

const seconds = z.number().positive().max(86_400);

export const settingsRouter = t.router({
  get: t.procedure.query(({ ctx }) => {
    const settings = ctx.settings.get();
    return {
      gate: ctx.settings.getTunables(),
      actuator: {
        provider: settings.actuator.provider,
        url: settings.actuator.url,
        gateEntityId: settings.actuator.gateEntityId,
        notifyService: settings.actuator.notifyService ?? null,
      },
      ble: settings.ble,
      logging: { ...settings.logging, level: ctx.log.getLevel() },
    };
  }),

  /** Applies on the next loop cycle; no restart needed. */
  updateGate: t.procedure
    .input(
      z
        .object({
          autoCloseTimeout: seconds,
          sessionTimeout: seconds,
          statusCheckInterval: seconds,
          bleScanInterval: seconds,
          tokenIdleTimeout: seconds,
          autoClosePollInterval: seconds,
        })
        .partial(),
    )
    .mutation(({ ctx, input }) => {
      const tunables = ctx.settings.updateTunables(input);
      ctx.log.info(`Gate settings updated: ${JSON.stringify(input)}`);
      ctx.eventBus.emit("settings:updated", { section: "gate", changes: input, timestamp: Date.now() });
      return tunables;
    }),

  setLogLevel: t.procedure
    .input(z.object({ level: z.enum(["debug", "info", "warn", "error"]) }))
    .mutation(({ ctx, input }) => {
      ctx.log.setLevel(input.level);
      ctx.settings.updateLogging({ level: input.level });
      ctx.eventBus.emit("settings:updated", {
        section: "logging",
        changes: { level: input.level },
        timestamp: Date.now(),
      });
      return { level: input.level };
    }),
});
