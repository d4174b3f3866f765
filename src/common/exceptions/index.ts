export * from './lms.exceptions';
