import { DBusError } from "dbus-next";
import { DisplayError } from "./DisplayError";

// Replies from the bus daemon itself: the compositor is gone, not refusing the call
const UNREACHABLE = new Set([
    "org.freedesktop.DBus.Error.ServiceUnknown",
    "org.freedesktop.DBus.Error.NameHasNoOwner",
    "org.freedesktop.DBus.Error.NoReply",
    "org.freedesktop.DBus.Error.Disconnected"
]);

/**
 * Error replies from the compositor become `rejected`; anything else, including socket failures
 * and an unreachable service, becomes `transport`.
 */
export function busCallError(operation: string, err: unknown): DisplayError {
    if (err instanceof DBusError && !UNREACHABLE.has(err.type)) {
        return new DisplayError({ kind: "rejected", operation, name: err.type, cause: err });
    }
    return new DisplayError({ kind: "transport", operation, cause: err });
}
