export { GuardrailEvaluator, increasesRisk, signedQty } from "./GuardrailEvaluator";
export type { GuardrailDecision, GuardrailEvaluatorOptions, GuardrailInput, GuardrailReason } from "./GuardrailEvaluator";
