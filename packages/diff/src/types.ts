/** A child statement with no nested block. */
export interface ConfigLine {
  readonly kind: 'line'
  readonly text: string
}

/** A header with the statements indented beneath it, in file order. */
export interface ConfigSection {
  readonly kind: 'section'
  readonly header: string
  readonly children: readonly ConfigNode[]
  /** Statement that closed the block in the source, such as `exit-address-family`. */
  readonly terminator?: string
}

export type ConfigNode = ConfigLine | ConfigSection

/** Every top-level statement is a section, even when it has no children. */
export interface ConfigTree {
  readonly sections: readonly ConfigSection[]
}

/** Three-way comparison of the subsections at one level of the tree. */
export interface LevelDiff {
  /** In the candidate only, in candidate order. */
  readonly added: readonly ConfigSection[]
  /** In the reference only, in reference order. */
  readonly removed: readonly ConfigSection[]
  /** In both, with different content; in candidate order. */
  readonly modified: readonly SectionDiff[]
}

export interface SectionDiff extends LevelDiff {
  readonly header: string
  /** Terminator of the block, taken from the candidate when it has one. */
  readonly terminator?: string
  readonly addedLines: readonly string[]
  readonly removedLines: readonly string[]
}

export type ConfigDiff = LevelDiff

/** Session commands a transport wraps around a replayed change set. */
export interface CommandFraming {
  readonly enter: readonly string[]
  readonly commit: readonly string[]
}
