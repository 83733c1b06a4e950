export { GameHost, type GameHostOptions, type PresentationPort } from './game-host';
export {
  gameFlowMachine,
  toGameFlowState,
  type GameFlowContext,
  type GameFlowEvent,
  type GameFlowInput,
  type GameFlowSnapshot,
} from './machines/game-flow';
export {
  MemoryHighScoreStore,
  FileHighScoreStore,
  recordHighScore,
  type HighScoreStore,
  type HighScoreUpdate,
} from './high-score';
export { loadGameConfig } from './config-loader';
export { createInspector } from './inspect';
