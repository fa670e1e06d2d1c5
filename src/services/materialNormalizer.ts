const REGEX_SPECIAL_RE = /[.*+?^${}()|[\]\\]/g;

/**
 * Maps free-form receipt lines onto standard material names.
 *
 * Keys are compiled into a single alternation ordered longest-first, so at any
 * position of a line the most specific receipt item wins ("냉동삼겹살" before
 * "삼겹"). Matches never overlap.
 */
export class MaterialNormalizer {
  private readonly mapping: ReadonlyMap<string, string>;
  private readonly pattern: RegExp | null;

  private constructor(mapping: ReadonlyMap<string, string>) {
    this.mapping = mapping;
    this.pattern = compilePattern(Array.from(mapping.keys()));
  }

  static build(mapping: ReadonlyMap<string, string>): MaterialNormalizer {
    return new MaterialNormalizer(new Map(mapping));
  }

  get size(): number {
    return this.mapping.size;
  }

  normalize(lines: Iterable<string>): Set<string> {
    const materials = new Set<string>();
    if (!this.pattern) {
      return materials;
    }

    for (const line of lines) {
      const cleaned = line.trim();
      if (!cleaned) continue;

      for (const match of cleaned.matchAll(this.pattern)) {
        const material = this.mapping.get(match[0]);
        if (material) {
          materials.add(material);
        }
      }
    }

    return materials;
  }
}

function compilePattern(keys: string[]): RegExp | null {
  const usable = keys.filter((key) => key.length > 0);
  if (usable.length === 0) {
    return null;
  }

  const ordered = usable
    .map((key, index) => ({ key, index }))
    .sort((left, right) => right.key.length - left.key.length || left.index - right.index)
    .map(({ key }) => escapeRegExp(key));

  return new RegExp(ordered.join("|"), "gu");
}

function escapeRegExp(value: string): string {
  return value.replace(REGEX_SPECIAL_RE, "\\$&");
}
