/**
 * Runs async tasks one at a time in submission order.
 */
export class SerialExecutor {
  private pending: Array<() => Promise<void>> = [];
  private active = false;

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const wrapped = async () => {
        try {
          resolve(await task());
        } catch (error) {
          reject(error);
        }
      };
      this.pending.push(wrapped);
      void this.process();
    });
  }

  private async process(): Promise<void> {
    if (this.active) {
      return;
    }
    this.active = true;
    while (this.pending.length > 0) {
      const next = this.pending.shift();
      if (next) {
        // wrapped tasks settle their own promise and never reject
        await next();
      }
    }
    this.active = false;
  }
}
