import { initTRPC } from "@trpc/server";
import { observable } from "@trpc/server/observable";
import { z } from "zod";
import type { GateBusEvent } from "@gatewarden/shared";
import type { TRPCContext } from "../context.js";
import type { EventBus, EventBusEvents } from "../../event-bus.js";

const t = initTRPC.context<TRPCContext>().create();

const reasonInput = z.object({ reason: z.string().min(1).max(200).default("Manual") }).optional();

/** Subscribes `handler` and returns the matching unsubscribe. */
function subscribe<K extends keyof EventBusEvents>(
  eventBus: EventBus,
  event: K,
  handler: EventBusEvents[K],
): () => void {
  eventBus.on(event, handler);
  return () => eventBus.off(event, handler);
}

export const gateRouter = t.router({
  status: t.procedure.query(({ ctx }) => {
    return ctx.runtime.getStatus();
  }),

  open: t.procedure.input(reasonInput).mutation(async ({ ctx, input }) => {
    const reason = input?.reason ?? "Manual";
    const success = await ctx.gate.requestOpen(reason);
    return { success, state: ctx.gate.getState() };
  }),

  close: t.procedure.input(reasonInput).mutation(async ({ ctx, input }) => {
    const reason = input?.reason ?? "Manual";
    const success = await ctx.gate.requestClose(reason);
    return { success, state: ctx.gate.getState() };
  }),

  onEvent: t.procedure.subscription(({ ctx }) => {
    return observable<GateBusEvent>((emit) => {
      const bus = ctx.eventBus;
      const unsubscribers = [
        subscribe(bus, "token:detected", ({ timestamp, ...data }) => {
          emit.next({ type: "token:detected", data, timestamp });
        }),
        subscribe(bus, "token:registered", ({ token, timestamp }) => {
          emit.next({ type: "token:registered", data: token, timestamp });
        }),
        subscribe(bus, "token:updated", ({ token, timestamp }) => {
          emit.next({ type: "token:updated", data: token, timestamp });
        }),
        subscribe(bus, "token:unregistered", ({ token, timestamp }) => {
          emit.next({ type: "token:unregistered", data: token, timestamp });
        }),
        subscribe(bus, "gate:state", ({ state, previous, timestamp }) => {
          emit.next({ type: "gate:state", data: { state, previous }, timestamp });
        }),
        subscribe(bus, "gate:opened", ({ reason, timestamp }) => {
          emit.next({ type: "gate:opened", data: { reason }, timestamp });
        }),
        subscribe(bus, "gate:closed", ({ reason, timestamp }) => {
          emit.next({ type: "gate:closed", data: { reason }, timestamp });
        }),
        subscribe(bus, "gate:failed", ({ action, reason, timestamp }) => {
          emit.next({ type: "gate:failed", data: { action, reason }, timestamp });
        }),
        subscribe(bus, "activity:recorded", (entry) => {
          emit.next({ type: "activity:recorded", data: entry, timestamp: entry.timestamp });
        }),
        subscribe(bus, "activity:cleared", ({ timestamp }) => {
          emit.next({ type: "activity:cleared", data: {}, timestamp });
        }),
      ];

      return () => unsubscribers.forEach((off) => off());
    });
  }),
});
