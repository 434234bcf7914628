/**
 * Source Control Port Interface
 *
 * Abstracts the queries the version resolver makes against a working copy,
 * so tests can substitute deterministic fakes for the real tool.
 */

export interface TagDescription {
  /** Nearest tag, e.g. `v1.2.0` */
  tag: string;
  /** Number of commits since the tag */
  distance: number;
  /** Abbreviated commit identifier as reported by the tool */
  hash: string;
}

export interface SourceControl {
  /** Whether `root` carries source-control metadata this implementation understands */
  isWorkingCopy(root: string): Promise<boolean>;

  /** Nearest tag description, or null when there is none or the query failed */
  describe(root: string): Promise<TagDescription | null>;

  /** Current branch name; `HEAD` for a detached head; null when the query failed */
  currentBranch(root: string): Promise<string | null>;

  /** Full identifier of the current HEAD commit, when cheaply known */
  headCommit(root: string): Promise<string | null>;
}
