export interface AddressPolicy {
  /** Comma-separated components that make an address specific enough. */
  minComponents: number;
  /** Whitespace tokens that make an address specific enough. */
  minTokens: number;
}

const CITATION_MARKER = /\[\d+\]/;
const CITATION_MARKERS = /\[\d+\]/g;

/** Strips `[12]`-style citation markers and collapses whitespace. */
export function cleanAddress(raw: string): string {
  let text = raw;
  // Removing one marker can join the brackets of another, e.g. `[[1]2]`.
  while (CITATION_MARKER.test(text)) {
    text = text.replace(CITATION_MARKERS, "");
  }
  return text.replace(/\s+/g, " ").trim();
}

export function addressComponents(address: string): string[] {
  return address
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);
}

export function isDetailedAddress(address: string, policy: AddressPolicy): boolean {
  const cleaned = cleanAddress(address);
  if (!cleaned) {
    return false;
  }

  const tokens = cleaned.split(" ").length;
  return addressComponents(cleaned).length >= policy.minComponents || tokens >= policy.minTokens;
}
