export { PermissionDeniedError } from "./errors.js"
export { Gate, type GateOptions } from "./gate.js"
