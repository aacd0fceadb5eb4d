export const DISCOVERY_CONFIG = Symbol('DISCOVERY_CONFIG');
export const SSH_CONFIG = Symbol('SSH_CONFIG');
export const DISCOVERY_SOURCE = Symbol('DISCOVERY_SOURCE');
