/**
 * Identifier masking for log lines
 */

export function maskEmail(email: string | null | undefined): string {
  if (!email) {
    return '***@***';
  }
  const at = email.indexOf('@');
  if (at <= 1) {
    return '***@***';
  }
  return `${email.charAt(0)}***${email.substring(at)}`;
}

export function maskTaxId(taxId: string | null | undefined): string {
  if (!taxId || taxId.length < 4) {
    return '************';
  }
  return `********${taxId.substring(taxId.length - 4)}`;
}

export function maskIdentifier(identifier: string | null | undefined): string {
  if (!identifier) {
    return '***';
  }
  return identifier.includes('@') ? maskEmail(identifier) : maskTaxId(identifier);
}

/**
 * Key under which attempts for one identifier are counted
 */
export function normalizeIdentifier(identifier: string): string {
  const trimmed = identifier.trim();
  return trimmed.includes('@') ? trimmed.toLowerCase() : trimmed;
}
