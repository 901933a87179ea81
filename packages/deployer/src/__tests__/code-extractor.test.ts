import { describe, it, expect, vi } from "vitest";
import type { CodeBlock } from "@seedling/shared";
import { extractCode } from "../deploy/code-extractor.js";

const code = (text: string): CodeBlock => ({ kind: "code", text });
const other = (text = "prose"): CodeBlock => ({ kind: "other", text });

describe("extractCode", () => {
  it("returns the first non-empty code block", () => {
    expect(extractCode([code("first"), code("second")])).toBe("first");
  });

  it("skips non-code blocks and empty code blocks", () => {
    const onEmptyBlock = vi.fn();
    const blocks = [other(), code(""), other("more"), code(""), code("hello"), code("later")];

    expect(extractCode(blocks, { onEmptyBlock })).toBe("hello");
    expect(onEmptyBlock.mock.calls).toEqual([[1], [3]]);
  });

  it("ignores text carried by non-code blocks", () => {
    expect(extractCode([other("not code")])).toBeUndefined();
  });

  it("returns undefined when nothing qualifies", () => {
    const onEmptyBlock = vi.fn();
    expect(extractCode([], { onEmptyBlock })).toBeUndefined();
    expect(extractCode([code(""), other()], { onEmptyBlock })).toBeUndefined();
    expect(onEmptyBlock).toHaveBeenCalledTimes(1);
  });

  it("keeps whitespace-only text as content", () => {
    expect(extractCode([code("\n")])).toBe("\n");
  });
});
