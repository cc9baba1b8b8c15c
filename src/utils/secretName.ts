/**
 * Derives a delivery key name from a target identifier:
 * keep [A-Za-z0-9_], prefix REPO_ unless the result starts with a letter, uppercase.
 *
 *   deriveSecretName('acme/web-app') === 'ACMEWEBAPP'
 *   deriveSecretName('42-tools')     === 'REPO_42TOOLS'
 */
export function deriveSecretName(identifier: string): string {
  let name = identifier.replace(/[^A-Za-z0-9_]/g, '');
  if (!/^[A-Za-z]/.test(name)) name = `REPO_${name}`;
  return name.toUpperCase();
}

export const SECRET_NAME_PATTERN = /^[A-Z][A-Z0-9_]*$/;
