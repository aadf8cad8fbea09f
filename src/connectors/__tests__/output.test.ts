import { describe, it, expect } from "vitest";
import { StreamCapture, TRUNCATION_NOTICE, completeUtf8Length, shellQuote, timeoutError } from "../output.js";

describe("StreamCapture", () => {
  it("returns the pushed bytes as text", () => {
    const capture = new StreamCapture();
    capture.push(Buffer.from("abc"));
    capture.push(Buffer.from("def"));
    expect(capture.text()).toBe("abcdef");
    expect(capture.wasTruncated).toBe(false);
  });

  it("cuts at the limit and appends the notice", () => {
    const capture = new StreamCapture(5);
    capture.push(Buffer.from("abc"));
    capture.push(Buffer.from("defg"));
    capture.push(Buffer.from("hij"));
    expect(capture.wasTruncated).toBe(true);
    expect(capture.text()).toBe(`abcde\n${TRUNCATION_NOTICE}`);
  });

  it("does not split a multi-byte character at the cut", () => {
    const capture = new StreamCapture(5);
    capture.push(Buffer.from("abcd\u00e9f"));
    expect(capture.text()).toBe(`abcd\n${TRUNCATION_NOTICE}`);
  });

  it("keeps a character that ends exactly at the cut", () => {
    const capture = new StreamCapture(6);
    capture.push(Buffer.from("abcd\u00e9f"));
    expect(capture.text()).toBe(`abcd\u00e9\n${TRUNCATION_NOTICE}`);
  });

  it("is empty when nothing was pushed", () => {
    expect(new StreamCapture().text()).toBe("");
  });
});

describe("completeUtf8Length", () => {
  it("drops a trailing partial sequence", () => {
    const euro = Buffer.from("x\u20ac");
    expect(euro.length).toBe(4);
    expect(completeUtf8Length(euro)).toBe(4);
    expect(completeUtf8Length(euro.subarray(0, 3))).toBe(1);
    expect(completeUtf8Length(euro.subarray(0, 2))).toBe(1);
  });

  it("leaves ASCII alone", () => {
    expect(completeUtf8Length(Buffer.from("plain"))).toBe(5);
  });
});

describe("shellQuote", () => {
  it("wraps in single quotes", () => {
    expect(shellQuote("src/main.rs")).toBe("'src/main.rs'");
  });

  it("escapes embedded single quotes", () => {
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});

describe("timeoutError", () => {
  it("states the timeout in seconds", () => {
    expect(timeoutError(30_000).message).toBe("Command timed out after 30 seconds");
  });
});
