export {
  ApiError,
  API_ROUTES,
  bookingApi,
  chatApi,
  configApi,
  healthApi,
  searchApi,
} from './client';
export { default } from './client';
