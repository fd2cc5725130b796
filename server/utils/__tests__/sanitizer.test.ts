import { describe, expect, it } from "vitest";
import { sanitizeForLog, sanitizeForOutput } from "../sanitizer";

describe("sanitizeForLog", () => {
  it("flattens line breaks so one message stays on one log line", () => {
    expect(sanitizeForLog("book\r\nfake entry\tinjected")).toBe("book  fake entry injected");
  });

  it("escapes markup and truncates to 200 characters", () => {
    expect(sanitizeForLog("<b>")).toBe("&lt;b&gt;");
    expect(sanitizeForLog("x".repeat(250))).toHaveLength(200);
  });
});

describe("sanitizeForOutput", () => {
  it("escapes HTML special characters", () => {
    expect(sanitizeForOutput(`<script>alert("it's")</script> & more`)).toBe(
      "&lt;script&gt;alert(&quot;it&#x27;s&quot;)&lt;/script&gt; &amp; more"
    );
  });
});
