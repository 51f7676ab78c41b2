import dbus from "dbus-next";
import type { MessageBus, Variant } from "dbus-next";
import { z } from "zod";
import type { Logger } from "../logger.js";
import type { AdvertisedDevice } from "./advertisement.js";
import type { DeviceSource } from "./scanner.js";

const BLUEZ = "org.bluez";
const ADAPTER_IFACE = "org.bluez.Adapter1";
const DEVICE_IFACE = "org.bluez.Device1";
const OBJECT_MANAGER_IFACE = "org.freedesktop.DBus.ObjectManager";

const bytes = z.custom<Uint8Array>((value) => value instanceof Uint8Array);

const deviceProps = z.object({
  Address: z.string(),
  Name: z.string().optional(),
  RSSI: z.number().optional(),
  ManufacturerData: z.record(bytes).optional(),
});

const managedObjects = z.record(z.record(z.record(z.unknown())));

/** Recursively replaces D-Bus variants with their plain values. */
export function unwrapVariants(value: unknown): unknown {
  if (value instanceof dbus.Variant) return unwrapVariants(value.value);
  if (value instanceof Uint8Array || value === null || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(unwrapVariants);
  return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, unwrapVariants(v)]));
}

/**
 * Converts one `GetManagedObjects` result into advertised devices. Devices
 * BlueZ remembers but did not hear in this window carry no RSSI and are skipped.
 */
export function devicesFromManagedObjects(raw: unknown, adapterPath: string): AdvertisedDevice[] {
  const objects = managedObjects.parse(unwrapVariants(raw));
  const devices: AdvertisedDevice[] = [];

  for (const [path, interfaces] of Object.entries(objects)) {
    if (!path.startsWith(adapterPath + "/")) continue;
    const props = interfaces[DEVICE_IFACE];
    if (!props) continue;

    const parsed = deviceProps.safeParse(props);
    if (!parsed.success || parsed.data.RSSI === undefined) continue;

    const manufacturerData = new Map<number, Uint8Array>();
    for (const [companyId, data] of Object.entries(parsed.data.ManufacturerData ?? {})) {
      manufacturerData.set(Number(companyId), data);
    }

    devices.push({
      address: parsed.data.Address,
      name: parsed.data.Name,
      rssi: parsed.data.RSSI,
      manufacturerData,
    });
  }
  return devices;
}

/** The BlueZ calls one discovery window needs. */
export interface BluezBus {
  setDiscoveryFilter(adapterPath: string, filter: Record<string, Variant>): Promise<void>;
  startDiscovery(adapterPath: string): Promise<void>;
  stopDiscovery(adapterPath: string): Promise<void>;
  getManagedObjects(): Promise<unknown>;
  disconnect(): void;
}

/** BlueZ on the system D-Bus, connected on first use. */
export class SystemBluezBus implements BluezBus {
  private bus: MessageBus | null = null;

  constructor(private log: Logger) {}

  async setDiscoveryFilter(adapterPath: string, filter: Record<string, Variant>): Promise<void> {
    const adapter = await this.getInterface(adapterPath, ADAPTER_IFACE);
    await adapter.SetDiscoveryFilter(filter);
  }

  async startDiscovery(adapterPath: string): Promise<void> {
    const adapter = await this.getInterface(adapterPath, ADAPTER_IFACE);
    await adapter.StartDiscovery();
  }

  async stopDiscovery(adapterPath: string): Promise<void> {
    const adapter = await this.getInterface(adapterPath, ADAPTER_IFACE);
    await adapter.StopDiscovery();
  }

  async getManagedObjects(): Promise<unknown> {
    const manager = await this.getInterface("/", OBJECT_MANAGER_IFACE);
    const raw: unknown = await manager.GetManagedObjects();
    return raw;
  }

  disconnect(): void {
    this.bus?.disconnect();
    this.bus = null;
  }

  private async getInterface(objectPath: string, iface: string) {
    const proxy = await this.getBus().getProxyObject(BLUEZ, objectPath);
    return proxy.getInterface(iface);
  }

  private getBus(): MessageBus {
    if (!this.bus) {
      this.bus = dbus.systemBus();
      this.bus.on("error", (err: unknown) => {
        this.log.error("D-Bus connection error:", err);
      });
    }
    return this.bus;
  }
}

/**
 * BLE discovery through BlueZ. Devices are read while discovery is still
 * running: BlueZ drops every RSSI once the last discovery client stops.
 */
export class BluezDeviceSource implements DeviceSource {
  private adapterPath: string;
  private bus: BluezBus;

  constructor(adapter: string, private log: Logger, bus?: BluezBus) {
    this.adapterPath = `/org/bluez/${adapter}`;
    this.bus = bus ?? new SystemBluezBus(log);
  }

  async discover(durationSeconds: number): Promise<AdvertisedDevice[]> {
    await this.bus.setDiscoveryFilter(this.adapterPath, {
      Transport: new dbus.Variant("s", "le"),
      DuplicateData: new dbus.Variant("b", false),
    });
    await this.bus.startDiscovery(this.adapterPath);

    let raw: unknown;
    try {
      await new Promise<void>((resolve) => setTimeout(resolve, durationSeconds * 1000));
      raw = await this.bus.getManagedObjects();
    } finally {
      await this.bus.stopDiscovery(this.adapterPath);
    }

    const devices = devicesFromManagedObjects(raw, this.adapterPath);
    this.log.debug(`BlueZ reported ${devices.length} devices on ${this.adapterPath}`);
    return devices;
  }

  async close(): Promise<void> {
    this.bus.disconnect();
  }
}
