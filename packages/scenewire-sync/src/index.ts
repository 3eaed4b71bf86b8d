export * from "./types.js";
export * from "./errors.js";
export * from "./codec.js";
export * from "./framing.js";
export * from "./transport.js";
export * from "./store.js";
export * from "./scheduler.js";
export * from "./session.js";
export * from "./manager.js";
export * from "./controls.js";
export * from "./handles.js";
export * from "./scene.js";
export * from "./client.js";
