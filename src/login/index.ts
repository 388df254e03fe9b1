export * from "./SessionState.js";
export * from "./sessionProbe.js";
export * from "./SliderSolver.js";
export * from "./LoginStateMachine.js";
