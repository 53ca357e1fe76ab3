export { generateFlow } from "./generateFlow";
export { runFlowCycle, flowSeedKey, type FlowCycleDependencies } from "./flowCycle";
export { resolvePeriod, validatePeriods } from "./periodResolver";
export { learnVibe } from "./vibeLearner";
export { synthesizeVibe, baseVibeFor, DEFAULT_PERIOD_VIBES } from "./vibeSynthesizer";
export { selectCandidates, passesRefinement } from "./candidateSelector";
export { selectAnchors, qualifyingHistory } from "./anchorSelector";
export {
    expandFromSeeds,
    bridgeAnchors,
    expansionBudget,
    selectSeeds,
} from "./sonicExpander";
export { sonicSort } from "./sonicSorter";
export { featureVectorDistance, resolveDistance } from "./sonicDistance";
export { assemblePlaylist, buildFlowDescription } from "./playlistAssembler";
export { applyArtistCap } from "./artistCap";
export * from "./types";
