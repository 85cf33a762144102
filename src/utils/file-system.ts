import * as fs from "node:fs/promises";
import type { FileSystem } from "@skill-init/scaffold-mutations";

export type { FileSystem };

export const nodeFileSystem: FileSystem = {
  readFile: (target, encoding) => fs.readFile(target, encoding),
  writeFile: (target, content, options) => fs.writeFile(target, content, options),
  mkdir: (target, options) => fs.mkdir(target, options),
  stat: (target) => fs.stat(target),
  chmod: (target, mode) => fs.chmod(target, mode)
};
