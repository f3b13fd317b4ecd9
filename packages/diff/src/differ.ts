import type {
  ConfigDiff,
  ConfigLine,
  ConfigNode,
  ConfigSection,
  ConfigTree,
  LevelDiff,
  SectionDiff,
} from './types.js'

function isSection(node: ConfigNode): node is ConfigSection {
  return node.kind === 'section'
}

function isLine(node: ConfigNode): node is ConfigLine {
  return node.kind === 'line'
}

/** Sections keyed by header; repeated headers are merged into the first. */
function mergeByHeader(sections: readonly ConfigSection[]): Map<string, ConfigSection> {
  const merged = new Map<string, ConfigSection>()
  for (const section of sections) {
    const existing = merged.get(section.header)
    merged.set(
      section.header,
      existing
        ? {
            ...existing,
            children: [...existing.children, ...section.children],
            terminator: existing.terminator ?? section.terminator,
          }
        : section
    )
  }
  return merged
}

function sectionHeaders(children: readonly ConfigNode[]): Set<string> {
  return new Set(children.filter(isSection).map((section) => section.header))
}

/**
 * A bare line written where the other side has a block with the same header
 * is that block, empty.
 */
function promoteLines(
  children: readonly ConfigNode[],
  headers: ReadonlySet<string>
): ConfigNode[] {
  return children.map(
    (node): ConfigNode =>
      isLine(node) && headers.has(node.text)
        ? { kind: 'section', header: node.text, children: [] }
        : node
  )
}

function uniqueLines(children: readonly ConfigNode[]): string[] {
  return [...new Set(children.filter(isLine).map((line) => line.text))]
}

function compareLevel(
  reference: readonly ConfigSection[],
  candidate: readonly ConfigSection[]
): LevelDiff {
  const before = mergeByHeader(reference)
  const after = mergeByHeader(candidate)

  const added: ConfigSection[] = []
  const modified: SectionDiff[] = []
  for (const [header, section] of after) {
    const previous = before.get(header)
    if (!previous) {
      added.push(section)
      continue
    }
    const change = compareSection(previous, section)
    if (!isEmptySectionDiff(change)) modified.push(change)
  }

  const removed = [...before.values()].filter((section) => !after.has(section.header))
  return { added, removed, modified }
}

function compareSection(reference: ConfigSection, candidate: ConfigSection): SectionDiff {
  const referenceChildren = promoteLines(reference.children, sectionHeaders(candidate.children))
  const candidateChildren = promoteLines(candidate.children, sectionHeaders(reference.children))
  const before = uniqueLines(referenceChildren)
  const after = uniqueLines(candidateChildren)
  const beforeSet = new Set(before)
  const afterSet = new Set(after)
  const terminator = candidate.terminator ?? reference.terminator

  return {
    header: candidate.header,
    ...(terminator === undefined ? {} : { terminator }),
    addedLines: after.filter((line) => !beforeSet.has(line)),
    removedLines: before.filter((line) => !afterSet.has(line)),
    ...compareLevel(referenceChildren.filter(isSection), candidateChildren.filter(isSection)),
  }
}

function isEmptySectionDiff(diff: SectionDiff): boolean {
  return diff.addedLines.length === 0 && diff.removedLines.length === 0 && isEmptyDiff(diff)
}

/**
 * Structural diff of two trees. Sections match by header; lines compare as
 * sets over each section's immediate children.
 */
export function diffConfigs(reference: ConfigTree, candidate: ConfigTree): ConfigDiff {
  return compareLevel(reference.sections, candidate.sections)
}

export function isEmptyDiff(diff: LevelDiff): boolean {
  return diff.added.length === 0 && diff.removed.length === 0 && diff.modified.length === 0
}

/** True when the diff adds anything at any depth. Removals are ignored. */
export function hasAdditions(diff: LevelDiff): boolean {
  return (
    diff.added.length > 0 ||
    diff.modified.some((section) => section.addedLines.length > 0 || hasAdditions(section))
  )
}

function applyToChildren(children: readonly ConfigNode[], diff: SectionDiff): ConfigNode[] {
  return [
    ...applyToSections(children, diff),
    ...diff.addedLines.map((text): ConfigLine => ({ kind: 'line', text })),
    ...diff.added,
  ]
}

function applyToSections(nodes: readonly ConfigNode[], diff: LevelDiff): ConfigNode[] {
  const pending = new Map(diff.modified.map((change) => [change.header, change]))
  return nodes.map((node): ConfigNode => {
    const header = isSection(node) ? node.header : node.text
    const change = pending.get(header)
    if (!change) return node
    pending.delete(header)
    const section: ConfigSection = {
      kind: 'section',
      header,
      children: applyToChildren(isSection(node) ? node.children : [], change),
    }
    const terminator = (isSection(node) ? node.terminator : undefined) ?? change.terminator
    return terminator === undefined ? section : { ...section, terminator }
  })
}

/**
 * Apply only the additive half of `diff` to `reference`: added sections and
 * lines are appended, removals are left in place. The first section of a
 * repeated header receives the changes.
 */
export function applyAdditions(reference: ConfigTree, diff: ConfigDiff): ConfigTree {
  const sections = applyToSections(reference.sections, diff).filter(isSection)
  return { sections: [...sections, ...diff.added] }
}
