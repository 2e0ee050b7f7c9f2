/**
 * Execution Module
 */

export {
  CollaboratorTimeoutError,
  DEFAULT_COLLABORATOR_TIMEOUT_MS,
  withTimeout,
} from './timeout.js';
