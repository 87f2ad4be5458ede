/**
 * Address of a cluster node as reported by the discovery transport.
 */
export type NodeAddress = string;

/**
 * Feature identifiers a node advertises when it is discovered.
 */
export type CapabilitySet = Iterable<string>;

export interface VersionInfo {
  name: string;
  version: string;
  os?: string;
}

export enum ServiceRole {
  BridgeNode = 'BridgeNode',
  SipGateway = 'SipGateway',
  RoomService = 'RoomService',
  ServerIdentity = 'ServerIdentity'
}

/**
 * Roles that hold at most one address at a time
 */
export type SingletonRole = ServiceRole.SipGateway | ServiceRole.RoomService;

/**
 * Immutable view of the single-valued bindings. A new object is created on
 * every change, so a reader holding a snapshot never sees a partial update.
 */
export interface ServiceBindings {
  readonly sipGateway?: NodeAddress;
  readonly roomService?: NodeAddress;
  readonly serverVersion?: VersionInfo;
}

export function formatVersion(info: VersionInfo): string {
  const base = `${info.name}/${info.version}`;
  return info.os ? `${base} (${info.os})` : base;
}
