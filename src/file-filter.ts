import type { FileChange } from "@/types"

/**
 * Normalizes user-supplied extensions: trims, drops a leading dot,
 * lowercases, and removes blanks and duplicates.
 */
export function normalizeExtensions(extensions: readonly string[]): string[] {
  const seen = new Set<string>()
  for (const raw of extensions) {
    const ext = raw.trim().replace(/^\./, "").toLowerCase()
    if (ext) seen.add(ext)
  }
  return [...seen]
}

/**
 * Lowercased text after the last `.` of the basename, or null if there is
 * none. A basename whose only dot is its first character (`.gitignore`) has
 * no extension.
 */
export function fileExtension(filePath: string): string | null {
  const basename = filePath.split("/").pop() ?? ""
  const dot = basename.lastIndexOf(".")
  if (dot <= 0 || dot === basename.length - 1) return null
  return basename.slice(dot + 1).toLowerCase()
}

/** True when no filter is set or the file's extension is in the set. */
export function matchesExtensions(
  filePath: string,
  extensions: readonly string[],
): boolean {
  if (extensions.length === 0) return true
  const ext = fileExtension(filePath)
  return ext !== null && extensions.includes(ext)
}

/** Files of a commit that pass the extension filter. */
export function filterFiles(
  files: readonly FileChange[],
  extensions: readonly string[],
): FileChange[] {
  return files.filter((f) => matchesExtensions(f.path, extensions))
}
