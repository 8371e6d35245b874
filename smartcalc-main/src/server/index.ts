export { WsServer, type WsServerOptions } from "./ws-server.js";
