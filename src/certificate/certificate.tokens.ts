export const CERTIFICATE_CONFIG = Symbol('CERTIFICATE_CONFIG');
export const ACME_ISSUER = Symbol('ACME_ISSUER');

export const CERTIFICATE_FILES_CHANGED_EVENT = 'certificate.files-changed';
