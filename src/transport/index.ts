export type {
  HttpMethod,
  Transport,
  TransportEngine,
  TransportEngineConfig,
  TransportEngineName,
  TransportRequest,
  TransportResponse,
} from "./types.js";
export { DEFAULT_TRANSPORT_ORDER, TRANSPORT_ENGINE_CONFIGS } from "./types.js";
export { TransportCascade, type TransportCascadeOptions } from "./cascade.js";
export { HttpEngine, httpEngine } from "./http/index.js";
export { TlsClientEngine, tlsClientEngine } from "./tlsclient/index.js";
