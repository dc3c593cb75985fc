import { log } from "@/logger";
import { MemoryError } from "@/memory/errors";

export function parseJsonStrict(str: string, what: string): unknown {
  try {
    return JSON.parse(str);
  } catch (error) {
    log.warn({ length: str.length }, `${what}: JSON parse failed`);
    throw new MemoryError("invalid_argument", `${what} is not valid JSON`, { cause: error });
  }
}

export function isValidJson(str: string): boolean {
  try {
    JSON.parse(str);
    return true;
  } catch {
    return false;
  }
}
