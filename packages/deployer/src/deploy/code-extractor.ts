import type { CodeBlock } from "@seedling/shared";

export interface ExtractOptions {
  onEmptyBlock?: (blockIndex: number) => void;
}

/**
 * Return the text of the first code block with non-empty text, scanning in
 * store order. Empty code blocks are reported and skipped.
 */
export function extractCode(
  blocks: readonly CodeBlock[],
  options: ExtractOptions = {},
): string | undefined {
  for (const [index, block] of blocks.entries()) {
    if (block.kind !== "code") continue;
    if (block.text === "") {
      options.onEmptyBlock?.(index);
      continue;
    }
    return block.text;
  }
  return undefined;
}
