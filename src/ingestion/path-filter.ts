/**
 * Include/exclude regex filter for candidate paths.
 *
 * @module ingestion/path-filter
 */

import type { FilterPatterns } from "./types.js";
import { PatternError, asError } from "./errors.js";

function compileAll(patterns: readonly string[], list: "include" | "exclude"): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern);
    } catch (error) {
      throw new PatternError(pattern, list, asError(error));
    }
  });
}

/**
 * Decides whether a path participates in a walk.
 *
 * A path is accepted when it matches every include pattern (none configured
 * means accept) and no exclude pattern. Patterns search anywhere in the path;
 * anchor with `^`/`$` to match the whole path.
 *
 * @example
 * ```typescript
 * const filter = PathFilter.compile({ include: ["\\.md$"], exclude: ["/drafts/"] });
 * filter.matches("/notes/todo.md"); // true
 * filter.matches("/notes/drafts/idea.md"); // false
 * ```
 */
export class PathFilter {
  private constructor(
    readonly include: readonly RegExp[],
    readonly exclude: readonly RegExp[]
  ) {}

  /**
   * @throws {PatternError} If any pattern is not a valid regular expression
   */
  static compile(patterns: FilterPatterns = {}): PathFilter {
    return new PathFilter(compileAll(patterns.include ?? [], "include"), compileAll(patterns.exclude ?? [], "exclude"));
  }

  /** Filter that accepts every path */
  static acceptAll(): PathFilter {
    return new PathFilter([], []);
  }

  matches(path: string): boolean {
    return this.include.every((pattern) => pattern.test(path)) && !this.exclude.some((pattern) => pattern.test(path));
  }
}
