import { DisplayError } from "./DisplayError";
import { busCallError } from "./busCallError";
import { EventEmitter } from "events";
import { debug } from "./debug";
import { decodeCurrentState } from "./decodeCurrentState";
import { encodeLogicalMonitors } from "./encodeLogicalMonitors";
import { sessionBus } from "dbus-next";
import { verbose } from "./verbose";
import type { ApplyLogicalMonitor } from "./ApplyLogicalMonitor";
import type { ApplyLogicalMonitorTuple } from "./ApplyLogicalMonitorTuple";
import type { ApplyMethod } from "./ApplyMethod";
import type { BusConfig } from "./BusConfig";
import type { ClientInterface, MessageBus, Variant } from "dbus-next";
import type { CurrentState } from "./CurrentState";
import type { DisplayConfigEvent } from "./DisplayConfigEvent";
import type { DisplayConfigService } from "./DisplayConfigService";

interface DisplayConfigInterface extends ClientInterface {
    GetCurrentState(): Promise<unknown>;
    ApplyMonitorsConfig(
        serial: number,
        method: number,
        logicalMonitors: ApplyLogicalMonitorTuple[],
        properties: Record<string, Variant>
    ): Promise<unknown>;
}

interface DisplayConfigProxyEvents {
    displayConfig: [event: DisplayConfigEvent];
}

function asError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}

export class DisplayConfigProxy extends EventEmitter<DisplayConfigProxyEvents> implements DisplayConfigService {
    #bus: MessageBus;
    #iface: DisplayConfigInterface;
    #busConfig: BusConfig;
    #closed = false;

    private constructor(bus: MessageBus, iface: DisplayConfigInterface, busConfig: BusConfig) {
        super();
        this.#bus = bus;
        this.#iface = iface;
        this.#busConfig = busConfig;

        this.#iface.on("MonitorsChanged", (): void => {
            verbose(`${busConfig.service}: MonitorsChanged`);
            this.emit("displayConfig", { type: "monitorsChanged" });
        });

        this.#bus.on("error", (err: unknown): void => {
            if (this.#closed) {
                return;
            }
            debug(`Session bus error: ${asError(err).message}`);
            this.emit("displayConfig", { type: "disconnected", error: asError(err) });
        });
    }

    static async connect(busConfig: BusConfig): Promise<DisplayConfigProxy> {
        let bus: MessageBus | undefined;
        const onEarlyError = (err: unknown): void => {
            debug(`Session bus error while connecting: ${asError(err).message}`);
        };

        try {
            bus = sessionBus();
            bus.on("error", onEarlyError);
            const object = await bus.getProxyObject(busConfig.service, busConfig.path);
            const iface = object.getInterface<DisplayConfigInterface>(busConfig.interface);
            bus.removeListener("error", onEarlyError);
            debug(`Connected to ${busConfig.service} at ${busConfig.path}`);
            return new DisplayConfigProxy(bus, iface, busConfig);
        } catch (err: unknown) {
            bus?.disconnect();
            throw new DisplayError({ kind: "transport", operation: `connect to ${busConfig.service}`, cause: err });
        }
    }

    async getCurrentState(): Promise<CurrentState> {
        let reply: unknown;
        try {
            reply = await this.#iface.GetCurrentState();
        } catch (err: unknown) {
            throw busCallError("GetCurrentState", err);
        }
        return decodeCurrentState(reply);
    }

    async applyMonitorsConfig(
        serial: number,
        method: ApplyMethod,
        logicalMonitors: readonly ApplyLogicalMonitor[]
    ): Promise<unknown> {
        const encoded = encodeLogicalMonitors(logicalMonitors);
        verbose(`ApplyMonitorsConfig serial=${serial} method=${method}:`, JSON.stringify(encoded));
        try {
            return await this.#iface.ApplyMonitorsConfig(serial, method, encoded, {});
        } catch (err: unknown) {
            throw busCallError("ApplyMonitorsConfig", err);
        }
    }

    subscribe(listener: (event: DisplayConfigEvent) => void): () => void {
        this.on("displayConfig", listener);
        return (): void => {
            this.off("displayConfig", listener);
        };
    }

    close(): void {
        if (this.#closed) {
            return;
        }
        this.#closed = true;
        this.removeAllListeners();
        this.#bus.disconnect();
        debug(`Disconnected from ${this.#busConfig.service}`);
    }
}
