export type { Clock } from "./clock.js";
export type { HttpClient, HttpResponse } from "./http.js";
