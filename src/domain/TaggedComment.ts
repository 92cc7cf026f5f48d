import { InvalidTagError } from './errors.js';

const TAG_PATTERN = /\s*<tag:([^<>]+)>\s*/g;

export interface ParsedComment {
  text: string;
  tags: Set<string>;
}

/**
 * Transaction comment with inline `<tag:NAME>` markers.
 *
 * The comment string stays the single source of truth; this is a view that can be
 * edited and rendered back. Tags form a set, so their order in the rendered text
 * carries no meaning.
 */
export class TaggedComment {
  private readonly tagSet: Set<string>;
  private readonly initialTags: ReadonlySet<string>;

  constructor(
    readonly text: string,
    tags: Iterable<string> = []
  ) {
    this.tagSet = new Set(tags);
    this.initialTags = new Set(this.tagSet);
  }

  static parse(raw: string | null | undefined): TaggedComment {
    const { text, tags } = parseComment(raw);
    return new TaggedComment(text, tags);
  }

  get tags(): ReadonlySet<string> {
    return this.tagSet;
  }

  /** True once the tag set differs from the one this comment was created with. */
  get changed(): boolean {
    if (this.tagSet.size !== this.initialTags.size) {
      return true;
    }
    for (const tag of this.tagSet) {
      if (!this.initialTags.has(tag)) {
        return true;
      }
    }
    return false;
  }

  has(tag: string): boolean {
    return this.tagSet.has(tag);
  }

  /** Returns false when the tag was already present. */
  add(tag: string): boolean {
    assertValidTag(tag);
    if (this.tagSet.has(tag)) {
      return false;
    }
    this.tagSet.add(tag);
    return true;
  }

  /** Returns false when the tag was not present. */
  remove(tag: string): boolean {
    return this.tagSet.delete(tag);
  }

  withText(text: string): TaggedComment {
    return new TaggedComment(text, this.tagSet);
  }

  render(): string {
    return renderComment(this.text, this.tagSet);
  }

  toString(): string {
    return this.render();
  }
}

export function parseComment(raw: string | null | undefined): ParsedComment {
  if (!raw) {
    return { text: '', tags: new Set() };
  }

  const tags = new Set<string>();
  const text = raw.replace(TAG_PATTERN, (_marker: string, name: string) => {
    tags.add(name);
    return ' ';
  });

  return { text: text.trim(), tags };
}

export function renderComment(text: string, tags: Iterable<string>): string {
  const markers = Array.from(tags, (tag) => `<tag:${tag}>`);
  return [text, ...markers].join(' ').trim();
}

function assertValidTag(tag: string): void {
  if (tag.length === 0 || tag.includes('<') || tag.includes('>')) {
    throw new InvalidTagError(tag);
  }
}
