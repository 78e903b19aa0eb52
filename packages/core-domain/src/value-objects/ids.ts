export type ModId = string;
export type ProfileId = string;
export type GameInstallId = string;
