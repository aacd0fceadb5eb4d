export const ROUTE_RESOLVER = Symbol('ROUTE_RESOLVER');
export const CERTIFICATE_ENSURER = Symbol('CERTIFICATE_ENSURER');
