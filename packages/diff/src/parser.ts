import { getLogger } from '@intentcfg/telemetry'
import { IntentCfgError } from '@intentcfg/types'
import type { ConfigNode, ConfigSection, ConfigTree } from './types.js'

const logger = getLogger(['intentcfg', 'diff'])

interface OpenNode {
  readonly text: string
  readonly indent: number
  readonly children: OpenNode[]
  terminator?: string
}

const TERMINATOR = /^exit(-\S+)?$/

function indentOf(line: string): number {
  return line.length - line.trimStart().length
}

function toSection(node: OpenNode): ConfigSection {
  const section: ConfigSection = {
    kind: 'section',
    header: node.text,
    children: node.children.map(toNode),
  }
  return node.terminator === undefined ? section : { ...section, terminator: node.terminator }
}

function toNode(node: OpenNode): ConfigNode {
  return node.children.length > 0 || node.terminator !== undefined
    ? toSection(node)
    : { kind: 'line', text: node.text }
}

/**
 * Parse indented CLI text into a section tree.
 *
 * A `!` line closes every open block at its indentation or deeper and is
 * dropped, as are blank lines and a top-level `end`. An indented `exit` or
 * `exit-*` statement becomes the terminator of the sibling block it closes,
 * which is kept as a block even when empty. Command vocabulary is otherwise
 * not interpreted.
 *
 * @throws {IntentCfgError} MalformedConfig when an indented line has no
 *   enclosing block
 */
export function parseConfig(text: string, source = '<inline>'): ConfigTree {
  const roots: OpenNode[] = []
  const open: OpenNode[] = []

  const closeFrom = (indent: number): void => {
    while (open.length > 0 && open[open.length - 1].indent >= indent) open.pop()
  }

  for (const [index, raw] of text.split(/\r?\n/).entries()) {
    const content = raw.trim()
    if (content === '') continue
    const indent = indentOf(raw.trimEnd())

    if (content === '!') {
      closeFrom(indent)
      continue
    }

    if (indent === 0) {
      open.length = 0
      if (content === 'end') continue
      const node: OpenNode = { text: content, indent, children: [] }
      roots.push(node)
      open.push(node)
      continue
    }

    closeFrom(indent)
    const parent = open[open.length - 1]
    if (!parent) {
      throw new IntentCfgError(
        'MalformedConfig',
        `${source} line ${index + 1}: "${content}" is indented but no block is open`,
        { source, line: index + 1, text: content }
      )
    }
    const previous = parent.children[parent.children.length - 1]
    if (
      TERMINATOR.test(content) &&
      previous !== undefined &&
      previous.indent === indent &&
      previous.terminator === undefined
    ) {
      previous.terminator = content
      continue
    }
    const node: OpenNode = { text: content, indent, children: [] }
    parent.children.push(node)
    open.push(node)
  }

  logger.debug`Parsed ${roots.length} top-level sections from ${source}`
  return { sections: roots.map(toSection) }
}

/** Render a tree back to indented text, one space per level. */
export function formatConfig(tree: ConfigTree): string {
  const lines: string[] = []
  const walk = (node: ConfigNode, depth: number): void => {
    const pad = ' '.repeat(depth)
    if (node.kind === 'line') {
      lines.push(pad + node.text)
      return
    }
    lines.push(pad + node.header)
    for (const child of node.children) walk(child, depth + 1)
    if (node.terminator !== undefined) lines.push(pad + node.terminator)
    if (depth === 0) lines.push('!')
  }
  for (const section of tree.sections) walk(section, 0)
  return lines.length > 0 ? lines.join('\n') + '\n' : ''
}
