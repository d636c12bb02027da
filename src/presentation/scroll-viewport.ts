export class ScrollViewport {
  private lineCount = 0;
  private height = 1;
  private offset = 0;

  setContentLength(lineCount: number): void {
    this.lineCount = Math.max(0, lineCount);
    this.clamp();
  }

  setHeight(height: number): void {
    this.height = Math.max(1, Math.floor(height));
    this.clamp();
  }

  getOffset(): number {
    return this.offset;
  }

  getHeight(): number {
    return this.height;
  }

  setOffset(offset: number): void {
    this.offset = offset;
    this.clamp();
  }

  scrollBy(delta: number): void {
    this.setOffset(this.offset + delta);
  }

  pageDown(): void {
    this.scrollBy(this.height);
  }

  pageUp(): void {
    this.scrollBy(-this.height);
  }

  toTop(): void {
    this.setOffset(0);
  }

  toBottom(): void {
    this.setOffset(this.maxOffset());
  }

  visibleSlice<T>(lines: readonly T[]): T[] {
    return lines.slice(this.offset, this.offset + this.height);
  }

  scrollPercent(): number {
    const max = this.maxOffset();
    return max === 0 ? 100 : Math.round((this.offset / max) * 100);
  }

  private maxOffset(): number {
    return Math.max(0, this.lineCount - this.height);
  }

  private clamp(): void {
    this.offset = Math.min(Math.max(0, Math.floor(this.offset)), this.maxOffset());
  }
}
