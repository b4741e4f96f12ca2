/**
 * DNS challenge verification
 */

export {
  normalizeTxtFragments,
  validateTxtSet,
  createPinnedResolver,
  type TxtResolver,
  type TxtValidationResult,
} from './dns-txt-validator.js';

export {
  waitForTxtRecord,
  type PropagationAttempt,
  type PropagationOptions,
} from './dns-propagation.js';
