import { CapabilitySet, ServiceRole } from '../types';
import { ROLE_PRECEDENCE, RoleRequirement } from './features';

export type CapabilityRole = RoleRequirement['role'];

/**
 * True when every required feature is present in the advertised set
 */
export function supportsFeatures(required: readonly string[], capabilities: CapabilitySet): boolean {
  const advertised = capabilities instanceof Set ? capabilities : new Set(capabilities);
  return required.every(feature => advertised.has(feature));
}

/**
 * Map an advertised capability set to the role it qualifies for.
 * Server identity is matched by address in the registry and never returned here.
 */
export function classify(
  capabilities: CapabilitySet,
  precedence: readonly RoleRequirement[] = ROLE_PRECEDENCE
): CapabilityRole | undefined {
  const advertised = new Set(capabilities);
  const match = precedence.find(requirement => supportsFeatures(requirement.features, advertised));
  return match?.role;
}

export function isBridge(capabilities: CapabilitySet): boolean {
  return classify(capabilities) === ServiceRole.BridgeNode;
}
