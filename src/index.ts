export { SplayTree } from "./tree/splayTree.ts";
export type { SplayTreeOptions } from "./tree/splayTree.ts";
export { LockedSplayTree } from "./tree/lockedSplayTree.ts";
export { entries, keys, range, values } from "./tree/traversal.ts";
export type { Entry } from "./tree/traversal.ts";
export type {
  HealthReport,
  NodeView,
  NodeVisitor,
  SplayMetrics,
  SplayResult,
  SplayStats,
  VisitedNode,
} from "./tree/types.ts";
export { renderDot, writeDot } from "./export/dot.ts";
export type { DotOptions } from "./export/dot.ts";
export {
  ConsoleDiagnosticsSink,
  FileDiagnosticsSink,
  MemoryDiagnosticsSink,
} from "./diagnostics.ts";
export type { DiagnosticsSink, DiagnosticsSnapshot } from "./diagnostics.ts";
export {
  SplayAllocationError,
  SplayInvariantError,
  SplayTreeError,
  SplayTreeStateError,
} from "./errors.ts";
export { defaultCompare, reverseCompare } from "./utils/compare.ts";
export type { Comparator } from "./utils/compare.ts";
export { CommandSession, HELP_TEXT } from "./cli/interpreter.ts";
export type { CommandOutcome } from "./cli/interpreter.ts";
export { COMPLETE_LAYOUT_KEYS, buildLayout, isDemoLayout, runDemo } from "./cli/demo.ts";
export type { DemoLayout, DemoProbe } from "./cli/demo.ts";
