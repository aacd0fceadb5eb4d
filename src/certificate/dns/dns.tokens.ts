export const DNS_CONFIG = Symbol('DNS_CONFIG');
export const DNS_CHALLENGE_PROVIDER = Symbol('DNS_CHALLENGE_PROVIDER');
