/**
 * Faults in a loaded game: the entity graph references something that does
 * not exist. Rule violations are never thrown; they come back as rejections.
 */
export class EngineFaultError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineFaultError';
  }
}
