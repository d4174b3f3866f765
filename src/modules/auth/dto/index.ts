export * from './register.dto';
export * from './login.dto';
export * from './password.dto';
