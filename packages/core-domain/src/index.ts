export * from "./value-objects/ids";

export * from "./entities/mod-file-entry";
export * from "./entities/mod";
export * from "./entities/profile";
export * from "./entities/backup";
export * from "./entities/overlay-entry";
export * from "./entities/conflict";
export * from "./entities/game-install";
