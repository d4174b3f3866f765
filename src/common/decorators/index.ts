export { Roles, ROLES_KEY } from './roles.decorator';
export { Public, IS_PUBLIC_KEY } from './public.decorator';
export { CurrentUser } from './current-user.decorator';
