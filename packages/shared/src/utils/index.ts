export { generateUlid, isValidUlid } from './ulid';
