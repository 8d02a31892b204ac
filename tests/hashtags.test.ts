import { describe, expect, it } from "vitest";

import { escapeHtml, extractHashtags, linkifyHashtags, withLinkedDescription } from "../server/search";

describe("extractHashtags", () => {
  it("lowercases and de-duplicates in first-seen order", () => {
    expect(extractHashtags("Love #Pottery and #pottery plus #glaze_work!")).toEqual(["pottery", "glaze_work"]);
  });

  it("returns nothing for empty input", () => {
    expect(extractHashtags(null)).toEqual([]);
    expect(extractHashtags(undefined)).toEqual([]);
    expect(extractHashtags("")).toEqual([]);
    expect(extractHashtags("no tags here")).toEqual([]);
  });
});

describe("linkifyHashtags", () => {
  it("wraps each tag in a hashtag link", () => {
    expect(linkifyHashtags("New bowls #pottery")).toBe(
      'New bowls <a href="/hashtag/pottery" class="hashtag-link">#pottery</a>'
    );
  });

  it("escapes markup and leaves character references alone", () => {
    expect(linkifyHashtags("<b>Tom's</b> #mug")).toBe(
      '&lt;b&gt;Tom&#39;s&lt;/b&gt; <a href="/hashtag/mug" class="hashtag-link">#mug</a>'
    );
  });

  it("returns an empty string for empty input", () => {
    expect(linkifyHashtags(null)).toBe("");
  });
});

describe("escapeHtml", () => {
  it("escapes ampersands and quotes", () => {
    expect(escapeHtml('a & "b"')).toBe("a &amp; &#34;b&#34;");
  });
});

describe("withLinkedDescription", () => {
  it("leaves a listing without description untouched", () => {
    const listing = { title: "Sketchbook", description: null };
    expect(withLinkedDescription(listing)).toBe(listing);
  });

  it("returns a copy with a linked description", () => {
    const listing = { title: "Mug", description: "#tea" };
    const linked = withLinkedDescription(listing);
    expect(linked.description).toBe('<a href="/hashtag/tea" class="hashtag-link">#tea</a>');
    expect(listing.description).toBe("#tea");
  });
});
