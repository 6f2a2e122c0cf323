/**
 * Opens a connection on first use and shares it. Concurrent first callers
 * wait on the same pending open, so only one connection is ever made; a
 * connection found closed is reopened on the next call.
 */
export class LazyConnection<T extends { isOpen: boolean }> {
  private current: T | null = null;
  private pending: Promise<T> | null = null;

  constructor(private readonly open: () => Promise<T>) {}

  get(): Promise<T> {
    if (this.current && this.current.isOpen) return Promise.resolve(this.current);
    if (this.pending) return this.pending;

    const pending: Promise<T> = this.open()
      .then((conn) => {
        if (this.pending === pending) this.current = conn;
        return conn;
      })
      .finally(() => {
        if (this.pending === pending) this.pending = null;
      });
    this.pending = pending;
    return pending;
  }

  /** Closes the shared connection, including one still being opened. */
  async close(quit: (conn: T) => Promise<unknown>): Promise<void> {
    const pending = this.pending;
    const current = this.current;
    this.pending = null;
    this.current = null;

    const conn = pending ? await pending : current;
    if (conn && conn.isOpen) {
      await quit(conn);
    }
  }
}
