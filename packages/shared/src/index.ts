export * from "./artifact/index.js"
export * from "./gate/index.js"
export * from "./orchestrator/index.js"
export * from "./permissions/index.js"
export * from "./reasoning/index.js"
export * from "./routing/index.js"
export * from "./session/index.js"
export * from "./skills/index.js"
export * from "./tools/index.js"
export * from "./tracing/index.js"
export * from "./turn/index.js"
export { compareNames } from "./common/order.js"
