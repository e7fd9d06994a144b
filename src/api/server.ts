import { Hono } from "hono";
import type { LedgerContext } from "../services/context";
import { accountsRoute } from "./routes/accounts";
import { eventsRoute } from "./routes/events";
import { healthRoute } from "./routes/health";
import { priceRoute } from "./routes/price";
import { simulateRoute } from "./routes/simulate";
import { vaultsRoute } from "./routes/vaults";
import { wsRoute } from "./routes/ws";

// Hono app composition. Routes remain thin; all logic lives in services.
export function createApp(ctx: LedgerContext) {
  const app = new Hono();
  app.route("/vaults", vaultsRoute(ctx));
  app.route("/accounts", accountsRoute(ctx));
  app.route("/price", priceRoute(ctx));
  app.route("/health", healthRoute(ctx));
  app.route("/events", eventsRoute(ctx));
  app.route("/simulate", simulateRoute());
  app.route("/ws", wsRoute(ctx));
  app.notFound((c) => c.json({ error: "Not found" }, 404));
  return app;
}
