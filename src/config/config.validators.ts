/**
 * Validates domain format using basic domain regex.
 *
 * Checks if a domain follows basic DNS naming rules.
 * Allows subdomains and TLDs with 2+ characters.
 *
 * @param domain - Domain name to validate
 * @returns True if domain format is valid
 */
export function isValidDomain(domain: string): boolean {
  // Matches: example.com, app.example.com, sub.domain.example.org
  return /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/.test(domain);
}

/**
 * Lower-cases a DNS name and removes surrounding whitespace and one trailing dot.
 */
export function normalizeDnsName(name: string): string {
  const trimmed = name.trim().toLowerCase();
  return trimmed.endsWith('.') ? trimmed.slice(0, -1) : trimmed;
}

// Lower-case DNS names only; keeps path separators and dot segments out of file names
const SAFE_FQDN_PATTERN = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?)+$/;

/**
 * Whether a normalized hostname can name a certificate file.
 */
export function isSafeFqdn(fqdn: string): boolean {
  return fqdn.length <= 253 && SAFE_FQDN_PATTERN.test(fqdn);
}

/**
 * Loose email check for the ACME account contact.
 */
export function isValidEmail(email: string): boolean {
  return /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(email);
}
