export { createContext, type GenerationContext, type PhaseOutput } from "./context";
export { placeFinishHolds } from "./finish-phase";
export { buildRoute } from "./generator";
export { footCandidates, moveCandidates, placeMiddleMoves } from "./middle-phase";
export { holdPairs, pickHoldPair } from "./pair";
export { nearestFeetBelow, placeStartHolds } from "./start-phase";
