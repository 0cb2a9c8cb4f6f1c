/**
 * Hostname helpers
 */

const DOMAIN_REGEX = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/;

/**
 * Strip scheme, a leading `www.`, a trailing dot and whitespace; lower-case.
 */
export function cleanDomain(domain: string): string {
  let cleaned = domain.trim().toLowerCase();
  cleaned = cleaned.replace(/^https?:\/\//, '');
  cleaned = cleaned.replace(/^www\./, '');
  cleaned = cleaned.replace(/\/.*$/, '');
  return cleaned.replace(/\.$/, '');
}

/**
 * Validate domain format
 */
export function isValidDomain(domain: string): boolean {
  return DOMAIN_REGEX.test(domain);
}

/**
 * Last two labels of a hostname; used to group rate limiting per root host.
 * `a.b.example.com` → `example.com`, `example.com` → `example.com`.
 */
export function extractRootDomain(hostname: string): string {
  const parts = hostname.split('.');
  if (parts.length <= 2) {
    return hostname;
  }
  return parts.slice(-2).join('.');
}

export function isSubdomainOf(domain: string, parentDomain: string): boolean {
  const child = domain.replace(/\.$/, '');
  const parent = parentDomain.replace(/\.$/, '');
  if (child === parent) {
    return false;
  }
  return child.endsWith(`.${parent}`);
}
