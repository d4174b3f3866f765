export { ResponseInterceptor, ApiEnvelope } from './response.interceptor';
