import { initTRPC } from "@trpc/server";
import type { TRPCContext } from "./context.js";
import { gateRouter } from "./routers/gate.js";
import { tokensRouter } from "./routers/tokens.js";
import { activityRouter } from "./routers/activity.js";
import { scanRouter } from "./routers/scan.js";
import { settingsRouter } from "./routers/settings.js";

const t = initTRPC.context<TRPCContext>().create();

export const appRouter = t.router({
  gate: gateRouter,
  tokens: tokensRouter,
  activity: activityRouter,
  scan: scanRouter,
  settings: settingsRouter,
});

export type AppRouter = typeof appRouter;

export const createCaller = t.createCallerFactory(appRouter);
