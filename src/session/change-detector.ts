/**
 * Edge-triggered change detection over a stream of page fingerprints.
 *
 * An empty fingerprint is a transient read failure: it never fires and never
 * replaces the last good value, so the next real change is still measured
 * against it.
 */
export class ChangeDetector {
  private lastFingerprint: string;
  private lastLocation: string;

  constructor(initialFingerprint: string, initialLocation: string) {
    this.lastFingerprint = initialFingerprint;
    this.lastLocation = initialLocation;
  }

  get fingerprint(): string { return this.lastFingerprint; }
  get location(): string { return this.lastLocation; }

  /** True exactly once per distinct fingerprint transition. */
  observe(fingerprint: string): boolean {
    if (!fingerprint) return false;
    if (fingerprint === this.lastFingerprint) return false;
    this.lastFingerprint = fingerprint;
    return true;
  }

  /**
   * True when the session navigated. Callers treat navigation as a content
   * change and drop their "last committed question" state.
   */
  observeLocation(location: string): boolean {
    if (!location || location === this.lastLocation) return false;
    this.lastLocation = location;
    return true;
  }
}
