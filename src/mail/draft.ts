/**
 * Mail Drafts
 *
 * In-memory representation of a message being composed. Headers keep
 * insertion order and are matched case-insensitively; transport encoding
 * is left to the sender.
 */

export type HeaderEntry = readonly [name: string, value: string];

/**
 * Read-only view of a stored message
 */
export interface MailMessage {
  get(name: string): string | undefined;
  getAll(name: string): string[];
  has(name: string): boolean;
  entries(): HeaderEntry[];
  readonly body: string;
}

export interface DraftInit {
  headers?: Record<string, string> | HeaderEntry[];
  body?: string;
  attachments?: MailMessage[];
}

export class Draft implements MailMessage {
  private headers: HeaderEntry[] = [];
  body: string;
  readonly attachments: MailMessage[];

  constructor(init: DraftInit = {}) {
    const entries = Array.isArray(init.headers)
      ? init.headers
      : Object.entries(init.headers ?? {});
    for (const [name, value] of entries) {
      this.add(name, value);
    }
    this.body = init.body ?? "";
    this.attachments = [...(init.attachments ?? [])];
  }

  /**
   * Copy any message into an editable draft
   */
  static from(message: MailMessage): Draft {
    const attachments = message instanceof Draft ? message.attachments : [];
    return new Draft({ headers: message.entries(), body: message.body, attachments });
  }

  get(name: string): string | undefined {
    const key = name.toLowerCase();
    return this.headers.find(([n]) => n.toLowerCase() === key)?.[1];
  }

  getAll(name: string): string[] {
    const key = name.toLowerCase();
    return this.headers.filter(([n]) => n.toLowerCase() === key).map(([, v]) => v);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /** Replace every occurrence of `name` with a single value */
  set(name: string, value: string): this {
    this.delete(name);
    return this.add(name, value);
  }

  add(name: string, value: string): this {
    this.headers.push([name, value]);
    return this;
  }

  delete(name: string): this {
    const key = name.toLowerCase();
    this.headers = this.headers.filter(([n]) => n.toLowerCase() !== key);
    return this;
  }

  entries(): HeaderEntry[] {
    return [...this.headers];
  }

  clone(): Draft {
    return Draft.from(this);
  }
}
