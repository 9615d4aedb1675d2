export * from "./config";
export * from "./convert";
export * from "./errors";
export * from "./fs";
export * from "./group";
export * from "./label";
export * from "./pair";
export * from "./random";
export * from "./source";
export * from "./split";
export * from "./yaml";
