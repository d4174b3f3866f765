export { Role, RoleName, ROLE_NAMES, isRoleName } from './role.entity';
export { UserProfile } from './user-profile.entity';
