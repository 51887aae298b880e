// Public surface of the water-sort solver

export {
  DEFAULT_SOLVER_SETTINGS,
  loadSolverSettings,
  parseSolverSettings,
  resolveSolverConfig,
} from "./app/settings";
export {
  describeMove,
  describeSolution,
  formatMove,
  formatState,
  formatTube,
} from "./puzzle/format";
export { parsePuzzle, type InputIssue, type ParseResult } from "./puzzle/input";
export {
  applyMove,
  canPour,
  colorCounts,
  isSolved,
  isUsefulMove,
  legalMoves,
  pourAmount,
  stateKey,
} from "./puzzle/state";
export { blockSize, isSettled, topColor } from "./puzzle/tube";
export { heuristic } from "./solver/heuristic";
export { solve, solvePuzzle } from "./solver/index";
export { replay, verifySolution, type ReplayResult } from "./solver/replay";
export { createTubeIndex, type TubeIndex } from "./types/brands";
export { setDebugTopics } from "./utils/debug";

export type {
  ColorToken,
  Move,
  PourMode,
  Puzzle,
  PuzzleInput,
  PuzzleState,
  Tube,
} from "./puzzle/types";
export type {
  SearchMode,
  SearchOutcome,
  SearchStats,
  SolveOptions,
  SolveResult,
  SolverSettings,
} from "./solver/types";
