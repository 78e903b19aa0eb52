import type { ModPayload } from "../value-objects/mod-payload";

export interface ModPayloadReader {
  /** Reads a folder or archive; throws CorruptArchiveError when it cannot be read. */
  read(payloadPath: string): Promise<ModPayload>;
}
