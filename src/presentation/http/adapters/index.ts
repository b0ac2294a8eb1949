export { ExpressPaginationRequest } from './ExpressPaginationRequest';
export { ExpressPaginationResponse } from './ExpressPaginationResponse';
