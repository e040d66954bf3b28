import { describe, expect, it } from "vitest";
import {
  escapeHtml,
  formatCaption,
  formatForwardedText,
  formatSenderName,
  TELEGRAM_MAX_CAPTION_LENGTH,
  truncateHtml,
} from "./format.js";

describe("escapeHtml", () => {
  it("escapes the characters Telegram HTML reserves", () => {
    expect(escapeHtml("a < b & c > d")).toBe("a &lt; b &amp; c &gt; d");
  });
});

describe("truncateHtml", () => {
  it("leaves short text alone", () => {
    expect(truncateHtml("abc", 5)).toBe("abc");
  });

  it("cuts long text and appends an ellipsis within the limit", () => {
    expect(truncateHtml("abcdef", 4)).toBe("abc…");
  });

  it("never cuts through an entity", () => {
    expect(truncateHtml("a&amp;b", 5)).toBe("a…");
  });

  it("never splits an emoji", () => {
    expect(truncateHtml("ab😀cd", 4)).toBe("ab…");
  });
});

describe("formatSenderName", () => {
  it("joins first and last name", () => {
    expect(formatSenderName({ user_id: 1, first_name: "Ann", last_name: "Lee", is_bot: false })).toBe("Ann Lee");
  });

  it("falls back to name, then username", () => {
    expect(formatSenderName({ user_id: 1, first_name: "", name: "Boris", is_bot: false })).toBe("Boris");
    expect(formatSenderName({ user_id: 1, first_name: " ", username: "boris_k", is_bot: false })).toBe("boris_k");
  });

  it("returns Unknown when nothing identifies the user", () => {
    expect(formatSenderName(null)).toBe("Unknown");
    expect(formatSenderName({ user_id: 1, first_name: "", is_bot: false })).toBe("Unknown");
  });
});

describe("formatForwardedText", () => {
  it("renders header, sender and text", () => {
    expect(formatForwardedText("Ann", "hi")).toBe("📩 <b>MAX</b>\n<b>From:</b> Ann\nhi");
  });

  it("escapes sender and text", () => {
    expect(formatForwardedText("A<b>", "x & y")).toBe("📩 <b>MAX</b>\n<b>From:</b> A&lt;b&gt;\nx &amp; y");
  });

  it("omits a blank body", () => {
    expect(formatForwardedText("Ann", "   ")).toBe("📩 <b>MAX</b>\n<b>From:</b> Ann");
    expect(formatForwardedText("Ann", null)).toBe("📩 <b>MAX</b>\n<b>From:</b> Ann");
  });
});

describe("formatCaption", () => {
  it("keeps captions within Telegram's caption limit", () => {
    const caption = formatCaption("Ann", "a".repeat(2000));
    expect(caption).toHaveLength(TELEGRAM_MAX_CAPTION_LENGTH);
    expect(caption.endsWith("a…")).toBe(true);
  });
});
