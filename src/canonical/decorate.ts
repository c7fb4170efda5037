/**
 * Cosmetic markup around a canonical type string, in the `<fg=COLOR>` tag
 * syntax used by console-style renderers. Never affects the canonical value.
 */

export const DEFAULT_COLOR = "cyan";

export function decorate(text: string, color: string = DEFAULT_COLOR): string {
  return `<fg=${color}>(${text})</>`;
}
