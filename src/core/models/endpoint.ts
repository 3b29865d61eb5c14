/**
 * Reachable device endpoint.
 */

export interface DeviceIdentity {
  readonly deviceId: string;
  readonly deviceName: string;
  /** Full advertised service name, empty when built by hand */
  readonly serviceName: string;
}

export interface DeviceEndpoint {
  readonly host: string;
  readonly controlPort: number;
  readonly identity: DeviceIdentity;
  /** Advertised key/value metadata, kept opaque */
  readonly advertisedCapabilities: Readonly<Record<string, string>>;
}

export const DEFAULT_CONTROL_PORT = 8080;

/**
 * Build an endpoint for a device whose address is already known.
 */
export function endpointFromHost(
  host: string,
  controlPort: number = DEFAULT_CONTROL_PORT,
  identity: Partial<DeviceIdentity> = {}
): DeviceEndpoint {
  return Object.freeze({
    host,
    controlPort,
    identity: Object.freeze({
      deviceId: identity.deviceId ?? `${host}:${String(controlPort)}`,
      deviceName: identity.deviceName ?? host,
      serviceName: identity.serviceName ?? '',
    }),
    advertisedCapabilities: Object.freeze({}),
  });
}

export function describeEndpoint(endpoint: DeviceEndpoint): string {
  return `${endpoint.identity.deviceName} (${endpoint.host}:${String(endpoint.controlPort)})`;
}
