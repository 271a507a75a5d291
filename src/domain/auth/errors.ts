class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DuplicateEmailError extends DomainError {
  constructor(message = 'Email is already registered') {
    super(message);
  }
}
