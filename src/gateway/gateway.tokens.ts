export const GATEWAY_CONFIG = Symbol('GATEWAY_CONFIG');
export const ADMIN_CONFIG = Symbol('ADMIN_CONFIG');
