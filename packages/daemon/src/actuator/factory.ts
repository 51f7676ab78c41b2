import type { ActuatorSettings } from "../settings/schema.js";
import type { Logger } from "../logger.js";
import type { ActuatorGateway } from "./types.js";
import { HomeAssistantGateway } from "./providers/home-assistant.js";
import { DummyGateway } from "./providers/dummy.js";

export function createGateway(settings: ActuatorSettings, log: Logger): ActuatorGateway {
  switch (settings.provider) {
    case "home_assistant":
      return new HomeAssistantGateway(settings, log.child("HomeAssistant"));
    case "dummy":
      return new DummyGateway(log.child("DummyGate"));
  }
}
