/**
 * Catalog construction: projects the live tool and skill registries into
 * routing targets. Rebuilt per routing call; registries are only read.
 */

import { compareNames } from "../common/order.js"
import type { SkillMetadata } from "../skills/types.js"
import { type RoutableAction, routingHintsOf } from "../tools/types.js"
import { createRoutingTarget, type RoutingTarget } from "./types.js"

export function buildTargetsFromTools(tools: Iterable<RoutableAction>): RoutingTarget[] {
  return [...tools]
    .sort((a, b) => compareNames(a.name, b.name))
    .map((tool) => createRoutingTarget(tool.name, "tool", tool.description, routingHintsOf(tool)))
}

export function buildTargetsFromSkills(skills: Iterable<SkillMetadata>): RoutingTarget[] {
  return [...skills]
    .sort((a, b) => compareNames(a.name, b.name))
    .map((skill) => createRoutingTarget(skill.name, "skill", skill.description, skill.hints))
}

/** Tools first, then skills; each group sorted by name. */
export function buildCatalog(
  tools: Iterable<RoutableAction>,
  skills: Iterable<SkillMetadata> = [],
): RoutingTarget[] {
  return [...buildTargetsFromTools(tools), ...buildTargetsFromSkills(skills)]
}
