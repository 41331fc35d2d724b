/**
 * Structured logging helpers.
 *
 * Full URLs may carry tracking params; logs get host and path only.
 */

export function sanitizeUrl(url?: string | null): { urlHost?: string; urlPath?: string } {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return { urlHost: parsed.host, urlPath: parsed.pathname }
  } catch {
    return { urlHost: 'invalid-url' }
  }
}

