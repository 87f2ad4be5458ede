import { ServiceRole } from '../types';

export const COLIBRI_NAMESPACE = 'http://jitsi.org/protocol/colibri';
export const JINGLE_DTLS_SRTP = 'urn:xmpp:jingle:apps:dtls-srtp';
export const JINGLE_ICE_UDP = 'urn:xmpp:jingle:transports:ice-udp:1';
export const JINGLE_RAW_UDP = 'urn:xmpp:jingle:transports:raw-udp:0';

export const SIP_GATEWAY_NAMESPACE = 'http://jitsi.org/protocol/jigasi';
export const RAYO_NAMESPACE = 'urn:xmpp:rayo:0';

export const MUC_NAMESPACE = 'http://jabber.org/protocol/muc';

/**
 * Features sufficient for a node to be recognized as a media bridge
 */
export const BRIDGE_FEATURES: readonly string[] = Object.freeze([
  COLIBRI_NAMESPACE,
  JINGLE_DTLS_SRTP,
  JINGLE_ICE_UDP,
  JINGLE_RAW_UDP
]);

export const SIP_GATEWAY_FEATURES: readonly string[] = Object.freeze([
  SIP_GATEWAY_NAMESPACE,
  RAYO_NAMESPACE
]);

export const ROOM_SERVICE_FEATURES: readonly string[] = Object.freeze([
  MUC_NAMESPACE
]);

export interface RoleRequirement {
  readonly role: ServiceRole.BridgeNode | ServiceRole.SipGateway | ServiceRole.RoomService;
  readonly features: readonly string[];
}

/**
 * Capability-based roles in the order they are tested. The first role whose
 * features are all advertised wins.
 */
const precedence: RoleRequirement[] = [
  { role: ServiceRole.BridgeNode, features: BRIDGE_FEATURES },
  { role: ServiceRole.SipGateway, features: SIP_GATEWAY_FEATURES },
  { role: ServiceRole.RoomService, features: ROOM_SERVICE_FEATURES }
];

export const ROLE_PRECEDENCE: readonly RoleRequirement[] = Object.freeze(precedence);
