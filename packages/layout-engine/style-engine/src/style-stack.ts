import { StyleFlag, styleFromBits, type StyleBits, type StyleFlagValue, type TextStyle } from '@textflow/contracts';

const OPEN_MARKER: Record<StyleFlagValue, string> = {
  [StyleFlag.Bold]: '<b>',
  [StyleFlag.Italic]: '<i>',
};

/**
 * Open toggles, innermost last.
 *
 * Closing a family removes its most recently opened entry wherever it sits, so
 * `<b>a <i>b</b> c</i>` leaves italic active after `</b>`.
 */
export class StyleStack {
  private readonly open: StyleFlagValue[] = [];

  get depth(): number {
    return this.open.length;
  }

  get bits(): StyleBits {
    let bits = 0;
    for (const flag of this.open) bits |= flag;
    return bits;
  }

  get style(): TextStyle {
    return styleFromBits(this.bits);
  }

  push(flag: StyleFlagValue): void {
    this.open.push(flag);
  }

  /** @returns false when no toggle of that family is open. */
  close(flag: StyleFlagValue): boolean {
    const index = this.open.lastIndexOf(flag);
    if (index === -1) return false;
    this.open.splice(index, 1);
    return true;
  }

  /** Opening markers still unmatched, outermost first. */
  openMarkers(): string[] {
    return this.open.map((flag) => OPEN_MARKER[flag]);
  }
}
