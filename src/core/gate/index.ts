export {
  evaluateGate,
  summarizeCoverage,
  DEFAULT_GATE_OPTIONS,
  type GateOptions,
  type GateResult,
  type GateState,
} from "./gate.js";
