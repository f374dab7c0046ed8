import { fs } from "../host-node/mod.ts";
import { fileOps } from "./file.ts";

export * from "./file.ts";
export * from "./fs.ts";

export const { withOpen, withCreate, withOpenFile } = fileOps(fs);
