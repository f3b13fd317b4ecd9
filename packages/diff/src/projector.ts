import type { CommandFraming, ConfigDiff, ConfigSection, SectionDiff } from './types.js'

function indent(depth: number): string {
  return ' '.repeat(depth)
}

function close(depth: number, terminator: string | undefined): string {
  return indent(depth) + (terminator ?? 'exit')
}

// A block with neither children nor a terminator is a single statement;
// `exit` after it would leave the enclosing mode.
function emitSection(section: ConfigSection, depth: number): string[] {
  const commands = [indent(depth) + section.header]
  for (const child of section.children) {
    if (child.kind === 'line') {
      commands.push(indent(depth + 1) + child.text)
    } else {
      commands.push(...emitSection(child, depth + 1))
    }
  }
  if (section.children.length > 0 || section.terminator !== undefined) {
    commands.push(close(depth, section.terminator))
  }
  return commands
}

function emitModified(change: SectionDiff, depth: number): string[] {
  const body = [
    ...change.addedLines.map((line) => indent(depth + 1) + line),
    ...change.added.flatMap((section) => emitSection(section, depth + 1)),
    ...change.modified.flatMap((nested) => emitModified(nested, depth + 1)),
  ]
  if (body.length === 0) return []
  return [indent(depth) + change.header, ...body, close(depth, change.terminator)]
}

/**
 * Commands that replay the additive part of a diff: new sections in full,
 * modified sections re-entered with only their new lines. Every block is
 * closed with the terminator it was parsed with, `exit` when it had none.
 * Removals produce no commands. Nested commands are indented one space per
 * level.
 */
export function projectDiff(diff: ConfigDiff): string[] {
  return [
    ...diff.added.flatMap((section) => emitSection(section, 0)),
    ...diff.modified.flatMap((change) => emitModified(change, 0)),
  ]
}

/** Wrap commands in session framing. Nothing to send stays nothing. */
export function frameCommands(commands: readonly string[], framing: CommandFraming): string[] {
  if (commands.length === 0) return []
  return [...framing.enter, ...commands, ...framing.commit]
}
