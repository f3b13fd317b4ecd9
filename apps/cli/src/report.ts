import type { ConfigDiff, SectionDiff } from '@intentcfg/diff'

function describeModified(change: SectionDiff, depth: number): string[] {
  const pad = '  '.repeat(depth)
  return [
    `${pad}~ ${change.header}`,
    ...change.addedLines.map((line) => `${pad}  + ${line}`),
    ...change.removedLines.map((line) => `${pad}  - ${line}`),
    ...change.added.map((section) => `${pad}  + ${section.header}`),
    ...change.removed.map((section) => `${pad}  - ${section.header}`),
    ...change.modified.flatMap((nested) => describeModified(nested, depth + 1)),
  ]
}

export function summarizeDiff(diff: ConfigDiff): string {
  return `${diff.added.length} added, ${diff.removed.length} removed, ${diff.modified.length} modified`
}

/**
 * Plain-text listing of a diff: `+` added, `-` removed, `~` modified, with
 * nested sections indented under their parent.
 */
export function formatDiff(diff: ConfigDiff): string[] {
  const lines = [
    ...diff.added.map((section) => `+ ${section.header}`),
    ...diff.removed.map((section) => `- ${section.header}`),
    ...diff.modified.flatMap((change) => describeModified(change, 0)),
  ]
  return lines.length > 0 ? lines : ['(no differences)']
}

export function formatDiffReport(
  title: string,
  diff: ConfigDiff,
  commands: readonly string[]
): string {
  return [
    `== ${title} (${summarizeDiff(diff)}) ==`,
    ...formatDiff(diff),
    commands.length > 0 ? 'Commands:' : 'Commands: (none)',
    ...commands.map((command) => `  ${command}`),
  ].join('\n')
}
