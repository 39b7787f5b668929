export { buildCatalog, buildTargetsFromSkills, buildTargetsFromTools } from "./catalog.js"
export {
  DEFAULT_CONFIDENCE_THRESHOLD,
  type Router,
  RuleRouter,
  type RuleRouterOptions,
} from "./router.js"
export {
  createRoutingTarget,
  type DecisionType,
  fallbackDecision,
  type FallbackDecision,
  isSelected,
  type RoutingDecision,
  type RoutingTarget,
  selectedDecision,
  type SelectedDecision,
  type TargetType,
  withArgs,
} from "./types.js"
