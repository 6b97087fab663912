import path from "node:path";
import fs from "fs-extra";

/**
 * Reads the commit message at `filePath`, hands it to `update`, and replaces
 * the file with the returned text. Returning `undefined` leaves the file
 * alone. The replacement is written beside the original and renamed over it,
 * so the message is either fully old or fully new.
 */
export async function withMessageBuffer(
  filePath: string,
  update: (message: string) => Promise<string | undefined> | string | undefined,
): Promise<boolean> {
  const original = await fs.readFile(filePath, "utf8");
  const next = await update(original);
  if (next === undefined || next === original) {
    return false;
  }

  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tmp`,
  );
  try {
    await fs.writeFile(tempPath, next, "utf8");
    await fs.rename(tempPath, filePath);
  } finally {
    await fs.remove(tempPath);
  }
  return true;
}
