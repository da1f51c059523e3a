/**
 * The image currently on display. Written by the updater, read by the
 * page handlers. Reads and writes are single synchronous steps on the
 * event loop, so a reader never observes a half-updated value.
 */
export class CurrentSelection {
  private value = "";
  changedAt: Date | undefined;

  get() {
    return this.value;
  }

  set(path: string) {
    this.value = path;
    this.changedAt = new Date();
  }
}
