export {
  artifactToJson,
  artifactToWire,
  buildArtifact,
  type BuildArtifactInput,
  type ExecutionArtifact,
  parseArtifactWire,
} from "./artifact.js"
export { mapKeys, toCamelCase, toSnakeCase } from "./keys.js"
export {
  type ActionResultWire,
  ActionResultWireSchema,
  ARTIFACT_VERSION,
  type ExecutionArtifactWire,
  ExecutionArtifactWireSchema,
  type ReasonerResponseWire,
  ReasonerResponseWireSchema,
  type RoutingDecisionWire,
  RoutingDecisionWireSchema,
} from "./schemas.js"
