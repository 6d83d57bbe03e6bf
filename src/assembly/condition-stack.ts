/**
 * Conditional nesting state kept as an explicit stack of booleans.
 * Content is active only while every open block is active.
 */
export class ConditionStack {
  private frames: boolean[] = [];

  push(active: boolean): void {
    this.frames.push(active);
  }

  /**
   * Close the innermost block. Returns false when there is none to close.
   */
  pop(): boolean {
    if (this.frames.length === 0) return false;
    this.frames.pop();
    return true;
  }

  get active(): boolean {
    return this.frames.every(Boolean);
  }

  get depth(): number {
    return this.frames.length;
  }
}
