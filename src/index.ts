// Main entry point for the conference services registry

// Types
export * from './types';

// Errors and logging
export * from './common/errors';
export * from './common/logger';

// Discovery
export * from './discovery/features';
export * from './discovery/CapabilityMatcher';

// Registry
export * from './registry/ServiceRegistry';
export * from './registry/types';

// Bridge pool
export * from './bridges/BridgeSelector';
export * from './bridges/types';

// Worker detectors
export * from './detectors/BreweryDetector';
export * from './detectors/RecorderDetector';
export * from './detectors/SipGatewayDetector';
export * from './detectors/types';

// Events and configuration
export * from './events/BridgeEventBus';
export * from './config/ServicesConfiguration';
