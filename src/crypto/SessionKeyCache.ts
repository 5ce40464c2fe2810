import type { CellKeys, KdfParams } from "../types";

/**
 * Caches the cell keys derived for one passphrase so a session does not
 * re-run Argon2 per cell. Lives in RAM only; clear it when the session ends.
 */
export class SessionKeyCache {
  private keys: CellKeys | null = null;
  private passphrase: string | null = null;
  private params: KdfParams | null = null;

  set(keys: CellKeys, passphrase: string, params: KdfParams) {
    this.keys = keys;
    this.passphrase = passphrase;
    this.params = params;
  }

  match(passphrase: string, params: KdfParams): CellKeys | null {
    if (!this.keys || !this.params) return null;
    if (
      this.passphrase === passphrase &&
      this.params.timeCost === params.timeCost &&
      this.params.memoryKiB === params.memoryKiB &&
      this.params.parallelism === params.parallelism
    ) {
      return this.keys;
    }
    return null;
  }

  clear() {
    this.keys = null;
    this.passphrase = null;
    this.params = null;
  }
}
