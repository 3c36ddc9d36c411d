export { AlwaysFlat, RsiMeanReversion, RsiParams } from "./RsiMeanReversion";
export { createStrategy, strategyNames } from "./registry";
