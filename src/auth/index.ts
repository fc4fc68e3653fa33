export { AuthTokenSet, extractBearerToken } from "./tokens";
