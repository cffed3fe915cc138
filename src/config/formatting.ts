/**
 * Header written before a source's content when headers are shown. Every
 * source after the first in the list is separated from earlier output by a
 * blank line.
 */
export function formatSourceHeader(name: string, index: number): string {
  const separator = index > 0 ? '\n' : '';
  return `${separator}==> ${name} <==\n`;
}
