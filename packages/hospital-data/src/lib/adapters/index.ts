export { systemClock } from "./system-clock.js";
export { createNodeFetchHttpClient, nodeFetchHttpClient } from "./node-fetch-http.js";
