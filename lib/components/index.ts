export { computeSuccessor, createTransitionFunction, decodeState, encodeState, validateRegisterLength, validateState, MAX_REGISTER_LENGTH } from './TransitionFunction';
export type { TransitionFunction } from './TransitionFunction';
export { decomposeCycles } from './CycleDecomposer';
