/**
 * Layer 4: Controller Layer
 *
 * Request handling logic that processes requests and coordinates responses.
 *
 * Responsibilities:
 * - Implement application-specific logic
 * - Handle input validation and output formatting
 * - Maintain thin controllers (delegate to services)
 */

export {
  Controller,
  validateData,
  type ControllerContext,
  type FieldRules,
  type ValidationSchema,
} from './base.ts';
