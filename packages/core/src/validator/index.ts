export { validateGroup } from './group-validator.js';
