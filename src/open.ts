/// # opening the result
///
/// hands the written file to whatever the platform opens html with. the
/// child is detached and unref'd: the browser outlives us, and we don't wait
/// for it.

import { spawn } from "child_process";
import { pathToFileURL } from "url";

export type Opener = (path: string) => Promise<void>;

export interface OpenCommand {
  command: string;
  args: string[];
}

export function openCommandFor(target: string, platform: NodeJS.Platform = process.platform): OpenCommand {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [target] };
    case "win32":
      /// `start` is a cmd builtin; its first quoted argument is a window title.
      return { command: "cmd", args: ["/c", "start", "", target] };
    default:
      return { command: "xdg-open", args: [target] };
  }
}

/// resolves once the opener process has started, rejects if it couldn't be
/// (e.g. no `xdg-open` on a headless box).
export const openInBrowser: Opener = path => {
  const { command, args } = openCommandFor(pathToFileURL(path).href);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: "ignore" });
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });
};
