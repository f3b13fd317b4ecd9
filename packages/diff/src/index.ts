export { parseConfig, formatConfig } from './parser.js'
export { diffConfigs, isEmptyDiff, hasAdditions, applyAdditions } from './differ.js'
export { projectDiff, frameCommands } from './projector.js'
export type {
  ConfigLine,
  ConfigSection,
  ConfigNode,
  ConfigTree,
  ConfigDiff,
  LevelDiff,
  SectionDiff,
  CommandFraming,
} from './types.js'
