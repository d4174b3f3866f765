export * from './update-profile.dto';
export * from './list-users.dto';
