/**
 * Transport interface: the contract between the polling core and the device.
 *
 * The core only ever asks for the output arguments of one action. Session
 * setup (device description, credentials) belongs to the implementation and
 * happens once before polling starts.
 */

/** Output arguments of a TR-064 action, keyed by argument name */
export type ActionArguments = Record<string, string | number>;

export interface IDeviceTransport {
  /**
   * Invoke `action` on `service` and return its output arguments.
   * An aborted `signal` cancels the request in flight.
   */
  call(service: string, action: string, signal?: AbortSignal): Promise<ActionArguments>;
}
