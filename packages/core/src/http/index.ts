export { buildUrl, createRequestFn, readJson } from './http';
export type {
  CreateRequestFnOptions,
  FetchFn,
  HttpMethod,
  MakeRequestFn,
  PreparedRequest,
  RequestOptions,
} from './http.types';
