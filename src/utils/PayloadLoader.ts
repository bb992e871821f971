import fs from "fs-extra";
import { Payload } from "../types";

export type LoadedPayload =
  | { status: "loaded"; name: string; data: Uint8Array; sourcePath?: string }
  | { status: "missing"; name: string; sourcePath: string };

/**
 * Resolves a payload to bytes. A file that does not exist is reported as
 * missing; any other read failure is thrown.
 */
export async function loadPayload(payload: Payload): Promise<LoadedPayload> {
  if ("data" in payload) {
    const data =
      typeof payload.data === "string"
        ? Buffer.from(payload.data, "utf8")
        : payload.data;
    return { status: "loaded", name: payload.name, data };
  }

  if (!(await fs.pathExists(payload.path))) {
    return { status: "missing", name: payload.name, sourcePath: payload.path };
  }

  const data = await fs.readFile(payload.path);
  return {
    status: "loaded",
    name: payload.name,
    data,
    sourcePath: payload.path,
  };
}
