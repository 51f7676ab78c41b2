import { initTRPC, TRPCError } from "@trpc/server";
import { z } from "zod";
import type { TokenWithPresence } from "@gatewarden/shared";
import type { TRPCContext } from "../context.js";
import { unwrapTokenResult } from "../errors.js";
import { tokenKey } from "../../tokens/normalize.js";

const t = initTRPC.context<TRPCContext>().create();

const LIVE_SCAN_SECONDS = 5;

const tokenId = z.string().trim().min(1).max(128);

export const tokensRouter = t.router({
  /**
   * Registered tokens with presence. `live` runs a short scan first and marks
   * every token heard in it as in range.
   */
  list: t.procedure
    .input(
      z
        .object({
          live: z.boolean().default(false),
          duration: z.number().positive().max(60).default(LIVE_SCAN_SECONDS),
        })
        .optional(),
    )
    .query(async ({ ctx, input }): Promise<TokenWithPresence[]> => {
      const heard = new Map<string, number>();
      if (input?.live) {
        const observations = await ctx.scanner.scanOnce(input.duration);
        const now = Date.now();
        for (const observation of observations) heard.set(tokenKey(observation.id), now);
      }

      return ctx.registry.list().map((token) => {
        const liveSeen = heard.get(tokenKey(token.id));
        return {
          ...token,
          inRange: liveSeen !== undefined || ctx.gate.isInRange(token.id),
          lastSeen: liveSeen ?? ctx.gate.lastSeenAt(token.id),
        };
      });
    }),

  get: t.procedure.input(z.object({ id: tokenId })).query(({ ctx, input }) => {
    const token = ctx.registry.get(input.id);
    if (!token) throw new TRPCError({ code: "NOT_FOUND", message: `Token ${input.id} not found` });
    return token;
  }),

  register: t.procedure
    .input(
      z.object({
        id: tokenId,
        name: z.string().max(100),
        enabled: z.boolean().default(true),
      }),
    )
    .mutation(({ ctx, input }) => {
      return unwrapTokenResult(ctx.registry.register(input.id, input.name, input.enabled), input.id);
    }),

  update: t.procedure
    .input(
      z.object({
        id: tokenId,
        name: z.string().max(100).optional(),
        enabled: z.boolean().optional(),
      }),
    )
    .mutation(({ ctx, input }) => {
      const result = ctx.registry.update(input.id, {
        displayName: input.name,
        enabled: input.enabled,
      });
      return unwrapTokenResult(result, input.id);
    }),

  unregister: t.procedure.input(z.object({ id: tokenId })).mutation(({ ctx, input }) => {
    return unwrapTokenResult(ctx.registry.unregister(input.id), input.id);
  }),
});
