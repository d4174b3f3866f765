export { ErrorTrackingFilter } from './error-tracking.filter';
