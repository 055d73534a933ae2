/**
 * Password hashing with bcrypt.
 */

import bcrypt from "bcryptjs";

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}

export class BcryptHasher implements PasswordHasher {
  private readonly _rounds: number;

  constructor(rounds: number) {
    this._rounds = rounds;
  }

  hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this._rounds);
  }

  verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }
}
