export {
  CircleRepository,
  DEFAULT_CIRCLE_CATEGORY,
  CREATOR_ROLE,
  MEMBER_ROLE,
} from './CircleRepository';
