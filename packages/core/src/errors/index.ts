export {
  BudgetExceededError,
  ConfigurationError,
  errorMessage,
  HelmsmanError,
  type HelmsmanErrorOptions,
  isHelmsmanError,
  PermissionDeniedError,
  ProviderError,
  ToolExecutionError,
} from "./types.js";
