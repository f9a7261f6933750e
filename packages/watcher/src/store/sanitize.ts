/** Directory name used when a module name sanitizes to nothing */
export const EMPTY_MODULE_DIR = "Unknown_Module";

// Reserved on Windows/SMB shares plus ASCII control characters
const ILLEGAL = /[<>:"/\\|?*\u0000-\u001f\u007f]/g;

/**
 * Turn a module name into a single safe directory name.
 *
 * Total and idempotent: `sanitizeModuleName(sanitizeModuleName(x))` equals
 * `sanitizeModuleName(x)` for every string. Letters, digits, CJK text,
 * spaces, hyphens, underscores and brackets pass through unchanged.
 */
export function sanitizeModuleName(name: string): string {
  let safe = name.replace(/\s+/g, " ").replace(ILLEGAL, "_").trim();
  if (safe === "") return EMPTY_MODULE_DIR;
  if (/^\.+$/.test(safe)) safe = safe.replace(/\./g, "_");
  return safe;
}
