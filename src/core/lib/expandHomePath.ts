/**
 * Resolve `~` and `~/...` against a home directory. `~user` forms are left alone.
 */
export const expandHomePath = (path: string, home: string): string => {
  if (path === "~") return home
  if (path.startsWith("~/")) {
    const base = home.endsWith("/") ? home.slice(0, -1) : home
    return `${base}/${path.slice(2)}`
  }
  return path
}
