export { UserRepository, DEFAULT_CATEGORY } from './UserRepository';
