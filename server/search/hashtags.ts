const HASHTAG_PATTERN = /#([\p{L}\p{N}_]+)/gu;
// Skips numeric character references such as &#39; produced by escapeHtml
const LINKABLE_HASHTAG_PATTERN = /(?<!&)#([\p{L}\p{N}_]+)/gu;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&#34;',
  "'": '&#39;'
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Hashtags in a listing description, lowercased and without the leading '#'.
 * First occurrence wins the position when a tag repeats.
 */
export function extractHashtags(text: string | null | undefined): string[] {
  if (!text) return [];
  const tags = Array.from(text.matchAll(HASHTAG_PATTERN), (match) => match[1].toLowerCase());
  return Array.from(new Set(tags));
}

// Tags are read from the title and the description together
export function listingText(title: string, description: string | null): string {
  return `${title} ${description ?? ''}`;
}

/**
 * Escape the text for HTML, then turn each #tag into a link to its hashtag page.
 */
export function linkifyHashtags(text: string | null | undefined): string {
  if (!text) return '';
  return escapeHtml(text).replace(LINKABLE_HASHTAG_PATTERN, (_match, tag: string) =>
    `<a href="/hashtag/${encodeURIComponent(tag)}" class="hashtag-link">#${tag}</a>`
  );
}

export function withLinkedDescription<T extends { description: string | null }>(listing: T): T {
  return listing.description
    ? { ...listing, description: linkifyHashtags(listing.description) }
    : listing;
}
