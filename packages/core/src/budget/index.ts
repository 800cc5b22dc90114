export {
  BUDGET_EXHAUSTED_MESSAGE,
  type BudgetBreach,
  type BudgetEvaluation,
  type BudgetLimits,
  type BudgetSnapshot,
  BudgetTracker,
  COST_WARNING_THRESHOLD,
  formatCost,
} from "./tracker.js";
