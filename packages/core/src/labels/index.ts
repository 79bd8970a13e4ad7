export { MAX_LABEL_LENGTH, toLabelName, sanitizeLabels, isAlreadyClassified } from './label-names.js';
