export {
  loadSkillFile,
  loadSkillInstructions,
  loadSkillMetadata,
  loadSkillResource,
  parseSkillMd,
  SKILL_FILENAME,
  splitFrontmatter,
  type SplitFrontmatter,
} from "./loader.js"
export { SkillRegistry, type SkillRegistryOptions } from "./registry.js"
export {
  ResourceAccessError,
  type SkillDefinition,
  SkillLoadError,
  type SkillMetadata,
  SkillNotFoundError,
} from "./types.js"
