export {
  validatePostInput,
  validateWantedUpdate,
  validateAcceptInput,
  isBoardConfig,
  boardConfigErrors,
} from './input_validator';
