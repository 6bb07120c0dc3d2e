import { randomBytes } from "@noble/hashes/utils";

const RETIRED_WINDOW = 64;

const randomU32 = (): number => {
  const b = randomBytes(4);
  return new DataView(b.buffer, b.byteOffset, 4).getUint32(0, true);
};

/**
 * Correlation tokens (`dejavu`). Never 0, which marks broadcasts, never one
 * still live and never one of the last 64 retired.
 */
export class TokenIssuer {
  private readonly live = new Set<number>();
  private readonly retired: number[] = [];

  constructor(private readonly random: () => number = randomU32) {}

  issue(): number {
    for (;;) {
      const token = this.random();
      if (token !== 0 && !this.live.has(token) && !this.retired.includes(token)) {
        this.live.add(token);
        return token;
      }
    }
  }

  retire(token: number): void {
    if (!this.live.delete(token)) return;
    this.retired.push(token);
    if (this.retired.length > RETIRED_WINDOW) this.retired.shift();
  }

  isRetired(token: number): boolean {
    return this.retired.includes(token);
  }
}
