import test from "node:test";
import assert from "node:assert/strict";
import { countChars, truncateForChat } from "../src/utils/text.js";

test("truncateForChat leaves text within the limit untouched", () => {
  const text = `${"a".repeat(196)}😀😀😀`;
  assert.equal(countChars(text), 199);
  assert.equal(truncateForChat(text, 200), text);
});

test("truncateForChat never splits an emoji at the cut point", () => {
  const truncated = truncateForChat(`${"a".repeat(196)}${"😀".repeat(5)}`, 200);
  assert.equal(truncated, `${"a".repeat(196)}😀...`);
  assert.equal(countChars(truncated), 200);
});

test("truncateForChat counts plain text by characters", () => {
  assert.equal(truncateForChat("abcdefghij", 8), "abcde...");
  assert.equal(truncateForChat("short"), "short");
});
