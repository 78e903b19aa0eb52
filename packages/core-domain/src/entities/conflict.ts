import type { ModId } from "../value-objects/ids";

export interface PathConflict {
  path: string;
  winner: ModId;
  losers: ModId[];
}
