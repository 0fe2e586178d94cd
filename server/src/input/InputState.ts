// ============================================
// Input State - Held Keys
// ============================================

// A terminal only reports presses (with auto-repeat), so a key counts
// as held for this long after its last press. Must outlast the terminal's
// delay before auto-repeat starts.
export const KEY_HOLD_MS = 500;

export class InputState {
  // Key name -> timestamp of last press
  private readonly pressedAt = new Map<string, number>();

  constructor(private readonly holdMs: number = KEY_HOLD_MS) {}

  press(key: string, now: number): void {
    this.pressedAt.set(key.toLowerCase(), now);
  }

  /**
   * Check if key is held at `now`
   */
  isKeyDown(key: string, now: number): boolean {
    const at = this.pressedAt.get(key.toLowerCase());
    return at !== undefined && now - at < this.holdMs;
  }
}
