/**
 * @arch testsmith.core.domain
 */

/**
 * Dotted import path for a logical source path.
 *
 * `pkg/services/user.py` -> `pkg.services.user`, `pkg/__init__.py` -> `pkg`.
 * An absolute path has no import root, so only its file name is used.
 */
export function toModuleName(logicalPath: string): string {
  const normalized = logicalPath.replace(/\\/g, '/');
  const isAbsolute = normalized.startsWith('/') || /^[A-Za-z]:\//.test(normalized);
  const relative = isAbsolute ? normalized.slice(normalized.lastIndexOf('/') + 1) : normalized;

  const segments = relative
    .replace(/\.pyi?$/, '')
    .split('/')
    .filter((segment) => segment !== '' && segment !== '.' && segment !== '..');
  if (segments.length > 1 && segments[segments.length - 1] === '__init__') {
    segments.pop();
  }

  const identifiers = segments.map((segment) =>
    segment.replace(/[^A-Za-z0-9_]/g, '_').replace(/^(\d)/, '_$1')
  );
  return identifiers.length > 0 ? identifiers.join('.') : 'module';
}

/**
 * Last segment of a dotted module name.
 */
export function moduleBaseName(moduleName: string): string {
  return moduleName.slice(moduleName.lastIndexOf('.') + 1);
}
