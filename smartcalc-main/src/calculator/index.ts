export { VariableScope } from "./scope.js";
export { normalize } from "./normalizer.js";
export { toPostfix, PRECEDENCE } from "./postfix.js";
export { applyOperator, calculate, evaluatePostfix, formatResult, tryCalculate } from "./evaluator.js";
export { applyAssignment, isAssignment } from "./assignment.js";
export { INT_MAX, INT_MIN, isValidName, parseInteger } from "./integer.js";
export { CalcError } from "./types.js";
export type { CalcErrorCode, CalcResult, Operator, Token } from "./types.js";
