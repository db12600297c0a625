import fs from "node:fs/promises";
import path from "node:path";

/**
 * Resolve a binary the way a shell would: paths containing a separator are
 * checked directly, bare names are searched along `PATH`.
 *
 * @returns Absolute path of the first executable match, or undefined
 */
export async function locateBinary(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string | undefined> {
  if (name.includes("/") || name.includes(path.sep)) {
    const resolved = path.resolve(name);
    return (await isExecutable(resolved)) ? resolved : undefined;
  }

  const extensions = process.platform === "win32" ? (env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";") : [""];

  for (const dir of (env.PATH ?? "").split(path.delimiter)) {
    if (dir.length === 0) continue;
    for (const ext of extensions) {
      const candidate = path.resolve(dir, name + ext);
      if (await isExecutable(candidate)) return candidate;
    }
  }
  return undefined;
}

async function isExecutable(file: string): Promise<boolean> {
  try {
    const stat = await fs.stat(file);
    if (!stat.isFile()) return false;
    await fs.access(file, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
