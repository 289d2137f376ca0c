/** Normalize an email address (lowercase, trim). Returns null when it cannot be an address. */
export function normalizeEmail(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const email = raw.trim().toLowerCase();
  const at = email.lastIndexOf('@');
  if (at < 0) return null;
  if (!email.slice(at + 1).includes('.')) return null;
  return email;
}

/**
 * Normalize a phone number to a +-prefixed digit string.
 * Ten digits are taken as North American and get the +1 country code.
 */
export function normalizePhone(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const digits = raw.replace(/\D/g, '');
  if (!digits) return null;
  if (digits.length === 10) return `+1${digits}`;
  return `+${digits}`;
}

/** Lowercase, keep letters and spaces only, collapse whitespace. */
export function normalizeName(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const name = raw
    .toLowerCase()
    .replace(/[^a-z\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
  return name || null;
}

export function emailDomain(email: string): string | null {
  const at = email.lastIndexOf('@');
  if (at < 0) return null;
  return email.slice(at + 1).toLowerCase() || null;
}
