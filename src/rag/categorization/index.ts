export { CategorizationEngine } from "./engine.js";
export { GeneralDetector, PatternDetector, defaultDetectors, loadDetectorDefinitions } from "./detectors.js";
export type { DetectorDefinition } from "./detectors.js";
export type { CategorizationOptions, CategoryDetector } from "./types.js";
