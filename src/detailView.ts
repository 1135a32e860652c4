import { wrapText } from './textUtils';

export const DETAIL_TITLE = "Full Text (Press 'b' to go back)";

// Scrollable, hard-wrapped view over one full string value.
export class DetailView {
  private offset = 0;
  private wrapped: { width: number; lines: string[] } | undefined;

  constructor(public readonly text: string, public readonly title = DETAIL_TITLE) {}

  public lines(width: number): string[] {
    if (!this.wrapped || this.wrapped.width !== width) {
      this.wrapped = { width, lines: wrapText(this.text, width) };
    }
    return this.wrapped.lines;
  }

  public scrollBy(delta: number, width: number, height: number): void {
    this.offset = this.clampOffset(this.offset + delta, width, height);
  }

  public scrollToEnd(width: number, height: number): void {
    this.offset = this.clampOffset(Number.MAX_SAFE_INTEGER, width, height);
  }

  public scrollToStart(): void {
    this.offset = 0;
  }

  public window(width: number, height: number): { offset: number; total: number; lines: string[] } {
    const lines = this.lines(width);
    this.offset = this.clampOffset(this.offset, width, height);
    return {
      offset: this.offset,
      total: lines.length,
      lines: lines.slice(this.offset, this.offset + Math.max(1, height))
    };
  }

  private clampOffset(offset: number, width: number, height: number): number {
    const maxOffset = Math.max(0, this.lines(width).length - Math.max(1, height));
    return Math.min(Math.max(0, offset), maxOffset);
  }
}
