import fs from "node:fs";
import { isRecord, parseConfigJson } from "./config-resolver.js";
import { ConfigInvalidError } from "./errors.js";

/** Read the catalog file as an opaque blob; ConfigResolver does the validation. */
export function loadCatalog(catalogPath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(catalogPath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigInvalidError("catalog", `cannot read ${catalogPath}: ${reason}`);
  }
  return parseConfigJson(content);
}

/**
 * Overlay a target block passed on the command line onto the catalog's entry
 * for the same ctid, keeping the rest of the catalog so that
 * `clone_from_ctid` can still find its source entry.
 */
export function overlayTargetBlock(catalog: unknown, ctid: number, block: unknown): unknown {
  if (!isRecord(block)) {
    throw new ConfigInvalidError("(target block)", "must be a JSON object");
  }
  const configs = isRecord(catalog) && isRecord(catalog.lxc_configs) ? catalog.lxc_configs : {};
  const base = configs[String(ctid)];
  const merged = isRecord(base) ? { ...base, ...block } : block;
  return { lxc_configs: { ...configs, [String(ctid)]: merged } };
}
