/**
 * Doc Block Parser
 *
 * Tokenizes the `/** ... *\/` comment in front of a routine's create header
 * into a short description, a long description and tags.
 *
 * Format:
 * - the short description ends at the first blank line or at the first line
 *   ending with a period
 * - the long description runs up to the first tag
 * - a tag starts with `@name` at the start of a line and continues up to the
 *   next tag; for `@param` the first word is the parameter name
 */

export interface DocTag {
  readonly name: string;
  /** Everything after `@name`, lines trimmed */
  readonly content: string;
  /** The part of `content` describing the subject (after the parameter name for `@param`) */
  readonly description: string;
}

export interface DocBlock {
  readonly shortDescription: string;
  readonly longDescription: string;
  readonly tags: readonly DocTag[];
}

export interface ParamDoc {
  readonly name: string;
  readonly description: string;
}

export const emptyDocBlock: DocBlock = { shortDescription: "", longDescription: "", tags: [] };

const DOC_COMMENT = /\/\*\*([\s\S]*?)\*\//g;
const TAG_LINE = /^@(\w+)(?:\s+([\s\S]*))?$/;

/**
 * Strip the comment decoration from the lines of a doc comment body
 */
function commentLines(body: string): string[] {
  const lines = body.split("\n").map(line => line.replace(/^\s*\*?/, "").trim());
  while (lines.length > 0 && lines[0] === "") lines.shift();
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

const joinTrimmed = (lines: readonly string[]): string => {
  const kept = [...lines];
  while (kept.length > 0 && kept[0] === "") kept.shift();
  while (kept.length > 0 && kept[kept.length - 1] === "") kept.pop();
  return kept.join("\n");
};

function makeTag(name: string, lines: readonly string[]): DocTag {
  const content = joinTrimmed(lines);
  if (name !== "param") {
    return { name, content, description: content };
  }
  const match = /^(\S+)\s*([\s\S]*)$/.exec(content);
  return { name, content, description: match?.[2]?.trim() ?? "" };
}

/**
 * Parse the last doc comment found in `text`.
 */
export function parseDocBlock(text: string): DocBlock {
  const bodies = [...text.matchAll(DOC_COMMENT)];
  const body = bodies[bodies.length - 1]?.[1];
  if (body === undefined) return emptyDocBlock;

  const lines = commentLines(body);
  const firstTag = lines.findIndex(line => TAG_LINE.test(line));
  const descriptionLines = firstTag === -1 ? lines : lines.slice(0, firstTag);
  const tagLines = firstTag === -1 ? [] : lines.slice(firstTag);

  // Short description
  let shortEnd = descriptionLines.findIndex(line => line === "" || line.endsWith("."));
  if (shortEnd === -1) {
    shortEnd = descriptionLines.length;
  } else if (descriptionLines[shortEnd] !== "") {
    shortEnd += 1;
  }
  const shortDescription = descriptionLines.slice(0, shortEnd).join(" ");
  const longDescription = joinTrimmed(descriptionLines.slice(shortEnd));

  // Tags
  const tags: DocTag[] = [];
  let current: { name: string; lines: string[] } | undefined;
  for (const line of tagLines) {
    const match = TAG_LINE.exec(line);
    if (match?.[1]) {
      if (current) tags.push(makeTag(current.name, current.lines));
      current = { name: match[1], lines: [match[2] ?? ""] };
    } else {
      current?.lines.push(line);
    }
  }
  if (current) tags.push(makeTag(current.name, current.lines));

  return { shortDescription, longDescription, tags };
}

/**
 * The `@param` tags of a doc block as (name, description) pairs, in order.
 */
export function paramDocs(docBlock: DocBlock): readonly ParamDoc[] {
  return docBlock.tags.flatMap(tag => {
    if (tag.name !== "param") return [];
    const name = /^\S+/.exec(tag.content)?.[0];
    return name === undefined ? [] : [{ name, description: tag.description }];
  });
}
