export { parseIntent, parseIntentText, loadIntentFile } from './load.js'
export { collectIntentIssues } from './validate.js'
export {
  IntentFileSchema,
  AutonomousSystemSchema,
  RouterSchema,
  LinkSchema,
  ConnectionSchema,
  RelationshipSchema,
} from './schema.js'
export type { IntentFile, IntentInput } from './schema.js'
export {
  lookupRouter,
  lookupAs,
  asOfRouter,
  findConnection,
  declaredRelationship,
  invertRelationship,
  linkKey,
} from './model.js'
export type {
  Intent,
  AutonomousSystem,
  Router,
  Link,
  Connection,
  Relationship,
  InternalRouting,
} from './model.js'
