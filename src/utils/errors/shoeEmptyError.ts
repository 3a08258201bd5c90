// utils/errors/shoeEmptyError.ts

/** Drawing from an exhausted shoe. Not a validation failure: the pre-deal reshuffle should make it impossible. */
export class ShoeEmptyError extends Error {
  constructor(public readonly numDecks: number) {
    super('The shoe is empty, cannot draw card');
    this.name = 'ShoeEmptyError';
  }
}
