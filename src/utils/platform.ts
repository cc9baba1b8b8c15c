/**
 * Short platform name for a target locator: "https://gitlab.example.com/x" -> "example",
 * "https://github.com/acme" -> "github". Falls back to "unknown" for anything unparsable.
 */
export function platformFromLocator(locator: string): string {
  let host: string;
  try {
    host = new URL(locator).hostname.toLowerCase();
  } catch {
    return 'unknown';
  }
  const labels = host.split('.').filter(Boolean);
  if (labels.length === 0) return 'unknown';
  if (labels.length === 1) return labels[0];
  return labels[labels.length - 2];
}
