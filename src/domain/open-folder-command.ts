/**
 * Shell command that opens `rootPath` in the platform's default file manager.
 * Only builds the string; running it is up to the caller.
 */
export function buildOpenFolderCommand(rootPath: string, platform: NodeJS.Platform): string {
  const quoted = `"${rootPath.replace(/(["\\$`])/g, '\\$1')}"`;
  switch (platform) {
    case 'darwin':
      return `open ${quoted}`;
    case 'win32':
      return `explorer "${rootPath.replace(/"/g, '""')}"`;
    default:
      return `xdg-open ${quoted}`;
  }
}
