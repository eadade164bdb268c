// src/utils/callbackUrl.ts

export function isValidCallbackUrl(url: string): boolean {
  const trimmed = url.trim();
  return trimmed.startsWith('http://') || trimmed.startsWith('https://');
}

/**
 * Normalizes a caller-supplied webhook URL. An unusable URL is dropped with an
 * advisory note instead of failing the request.
 */
export function sanitizeCallbackUrl(url: string | null | undefined): { url: string | null; note?: string } {
  const trimmed = url?.trim();
  if (!trimmed) return { url: null };

  if (!isValidCallbackUrl(trimmed)) {
    return {
      url: null,
      note: `Ignoring callback_url '${trimmed}': it must start with http:// or https://`,
    };
  }
  return { url: trimmed };
}
