export {
    StructuralGate,
    contentLines,
    type GateVerdict,
    type GateRejectReason,
    type LineShapeCounts,
    type StructuralGateOptions,
} from "./StructuralGate.js";
