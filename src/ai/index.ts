export type { MoveProposer } from './MoveProposer';
export { LlmMoveProposer } from './LlmMoveProposer';
export type { ChatCompletion } from './LlmMoveProposer';
export { RandomMoveProposer } from './RandomMoveProposer';
export { buildMoveMessages, labelBoard } from './prompt';
export type { ChatMessage } from './prompt';
