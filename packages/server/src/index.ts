export { createApp, type AppOptions } from "./app.js";
export { ChatRequestSchema, type ChatRequestBody } from "./schema.js";
export { listen } from "./listen.js";
export { toHttpError, type ErrorBody } from "./errors.js";
