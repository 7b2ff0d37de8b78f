import { UnauthorizedOwnerError } from '../errors';

/** The two principals allowed to decide orders and run broadcasts. */
export class OwnerAllowList {
  readonly ids: readonly string[];

  constructor(ids: readonly string[]) {
    this.ids = [...ids];
  }

  isOwner(id: string): boolean {
    return this.ids.includes(id);
  }

  assertOwner(id: string): void {
    if (!this.isOwner(id)) {
      throw new UnauthorizedOwnerError(id);
    }
  }
}
