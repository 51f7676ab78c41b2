import WebSocket from "ws";
import {
  createConnection,
  createLongLivedTokenAuth,
  ERR_CANNOT_CONNECT,
  ERR_INVALID_AUTH,
  type Connection,
  type HassEntity,
} from "home-assistant-js-websocket";
import type { ActuatorStatus } from "@gatewarden/shared";
import type { ActuatorSettings, ServiceCall } from "../../settings/schema.js";
import type { Logger } from "../../logger.js";
import {
  ActuatorUnavailableError,
  errorMessage,
  withRetry,
  type ActuatorGateway,
} from "../types.js";

// home-assistant-js-websocket opens sockets through the global WebSocket; Node 20 has none
if (!("WebSocket" in globalThis)) Object.assign(globalThis, { WebSocket });

function describeConnectError(err: unknown): string {
  if (err === ERR_CANNOT_CONNECT) return "cannot connect";
  if (err === ERR_INVALID_AUTH) return "invalid access token";
  return errorMessage(err);
}

export class HomeAssistantGateway implements ActuatorGateway {
  readonly name = "home_assistant";

  private connection: Connection | null = null;
  private url: string;

  constructor(
    private settings: ActuatorSettings,
    private log: Logger,
  ) {
    this.url = settings.url.replace(/\/+$/, ""); // strip trailing slash
  }

  async connect(): Promise<void> {
    if (!this.url || !this.settings.token) {
      throw new ActuatorUnavailableError("Home Assistant url and token must be configured");
    }

    const auth = createLongLivedTokenAuth(this.url, this.settings.token);
    try {
      this.connection = await createConnection({ auth });
    } catch (err) {
      throw new ActuatorUnavailableError(
        `Home Assistant at ${this.url}: ${describeConnectError(err)}`,
        { cause: err },
      );
    }

    this.connection.addEventListener("disconnected", () => {
      this.log.warn("Connection lost, reconnecting");
    });
    this.connection.addEventListener("ready", () => {
      this.log.info("Connection re-established");
    });

    this.log.info(`Connected to ${this.url} (gate entity ${this.settings.gateEntityId})`);
  }

  async disconnect(): Promise<void> {
    this.connection?.close();
    this.connection = null;
    this.log.info("Disconnected");
  }

  async open(): Promise<boolean> {
    return this.runAction("open", this.settings.openAction);
  }

  async close(): Promise<boolean> {
    return this.runAction("close", this.settings.closeAction);
  }

  async notify(title: string, message: string): Promise<boolean> {
    const service = this.settings.notifyService?.replace(/^notify\./, "");
    if (!service) return false;

    try {
      await this.withRetry("notify", () =>
        this.requireConnection().sendMessagePromise({
          type: "call_service",
          domain: "notify",
          service,
          service_data: { title, message },
        }),
      );
      return true;
    } catch (err) {
      this.log.warn(`Notification via notify.${service} failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async queryState(): Promise<ActuatorStatus> {
    const connection = this.connection;
    if (!connection) throw new ActuatorUnavailableError("Not connected to Home Assistant");

    let states: HassEntity[];
    try {
      states = await connection.sendMessagePromise<HassEntity[]>({ type: "get_states" });
    } catch (err) {
      throw new ActuatorUnavailableError(`State query failed: ${errorMessage(err)}`, { cause: err });
    }

    const entityId = this.settings.gateEntityId;
    const entity = states.find((e) => e.entity_id === entityId);
    if (!entity) {
      return {
        online: true,
        info: { url: this.url, entityId },
        error: `Entity ${entityId} not found`,
      };
    }

    return {
      online: true,
      state: entity.state,
      info: {
        url: this.url,
        entityId,
        friendlyName: entity.attributes.friendly_name ?? entityId,
        lastChanged: entity.last_changed,
        ...(entity.attributes.current_position != null
          ? { position: entity.attributes.current_position }
          : {}),
      },
    };
  }

  private async runAction(label: "open" | "close", action: ServiceCall): Promise<boolean> {
    const entityId = action.entityId ?? this.settings.gateEntityId;
    try {
      await this.withRetry(label, () =>
        this.requireConnection().sendMessagePromise({
          type: "call_service",
          domain: action.domain,
          service: action.service,
          target: { entity_id: entityId },
          service_data: action.data ?? {},
        }),
      );
      this.log.info(`${action.domain}.${action.service} on ${entityId} succeeded`);
      return true;
    } catch (err) {
      this.log.error(`Failed to ${label} gate via ${action.domain}.${action.service}: ${errorMessage(err)}`);
      return false;
    }
  }

  private withRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      attempts: this.settings.retryAttempts,
      delayMs: this.settings.retryDelayMs,
      onRetry: (attempt, err) => {
        this.log.warn(`${label} attempt ${attempt} failed (${errorMessage(err)}), retrying`);
      },
    });
  }

  private requireConnection(): Connection {
    if (!this.connection) throw new ActuatorUnavailableError("Not connected to Home Assistant");
    return this.connection;
  }
}
