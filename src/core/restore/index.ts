/**
 * Restore module exports
 */

export {
  isTerminal,
  RestoreCoordinator,
  type RestoreOutcome,
  type RestoreRequest,
  type RestoreSession,
  type RestoreState,
} from "./coordinator";
