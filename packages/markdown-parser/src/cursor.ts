export interface CursorState {
  readonly position: number
  readonly previousPosition: number
}

/**
 * Repositionable view over one block's inline text. `saveState` snapshots are
 * plain values, so a speculative parse can be abandoned at any depth by
 * handing the snapshot back to `restoreState`.
 */
export class Cursor {
  private currentPosition = 0
  private previousPosition = 0

  constructor(private readonly line: string) {}

  get position(): number {
    return this.currentPosition
  }

  get length(): number {
    return this.line.length
  }

  getLine(): string {
    return this.line
  }

  getCharacter(): string | null {
    return this.charAt(this.currentPosition)
  }

  /** Character `offset` places from the current one; `null` outside the text. */
  peek(offset = 1): string | null {
    return this.charAt(this.currentPosition + offset)
  }

  isAtEnd(): boolean {
    return this.currentPosition >= this.line.length
  }

  advance() {
    this.advanceBy(1)
  }

  advanceBy(characters: number) {
    this.previousPosition = this.currentPosition
    this.currentPosition = Math.min(this.currentPosition + characters, this.line.length)
  }

  /** Skips spaces and tabs, crossing at most one newline. Returns the number skipped. */
  advanceToNextNonSpaceOrNewline(): number {
    const match = /^[ \t]*(?:\n[ \t]*)?/.exec(this.getRemainder())
    const skipped = match ? match[0].length : 0
    if (skipped > 0) this.advanceBy(skipped)
    return skipped
  }

  /** Consumes and returns an anchored match of `pattern` at the cursor, or null. */
  match(pattern: RegExp): string | null {
    const flags = pattern.flags.replace(/[gy]/g, "")
    const anchored = new RegExp(pattern.source, `${flags}y`)
    anchored.lastIndex = this.currentPosition
    const result = anchored.exec(this.line)
    if (!result) return null
    this.advanceBy(result[0].length)
    return result[0]
  }

  getRemainder(): string {
    return this.line.slice(this.currentPosition)
  }

  getSubstring(start: number, length?: number): string {
    return length === undefined ? this.line.slice(start) : this.line.slice(start, start + length)
  }

  /** Text consumed by the most recent advance. */
  getPreviousText(): string {
    return this.line.slice(this.previousPosition, this.currentPosition)
  }

  saveState(): CursorState {
    return { position: this.currentPosition, previousPosition: this.previousPosition }
  }

  restoreState(state: CursorState) {
    this.currentPosition = state.position
    this.previousPosition = state.previousPosition
  }

  private charAt(index: number): string | null {
    if (index < 0 || index >= this.line.length) return null
    return this.line[index]
  }
}
