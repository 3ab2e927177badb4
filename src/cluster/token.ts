/**
 * Worker join token. Written once per run, read by every worker join.
 */
export class JoinToken {
  private value: string | null = null;

  get isSet(): boolean {
    return this.value !== null;
  }

  set(token: string): void {
    if (this.value !== null) {
      throw new Error('Join token already set for this run');
    }
    if (token.trim() === '') {
      throw new Error('Join token is empty');
    }
    this.value = token.trim();
  }

  reveal(): string {
    if (this.value === null) {
      throw new Error('Join token requested before it was fetched');
    }
    return this.value;
  }

  /** Safe for logs: first 10 characters only. */
  masked(): string {
    if (this.value === null) return '<unset>';
    return `${this.value.slice(0, 10)}...`;
  }

  toString(): string {
    return this.masked();
  }

  toJSON(): string {
    return this.masked();
  }
}
