export class EmptyModelError extends Error {
  constructor(message = "cannot sample from a model with no observations") {
    super(message);
    this.name = "EmptyModelError";
  }
}

export class UnseenContextError extends Error {
  readonly prefix: readonly string[];

  constructor(prefix: readonly string[]) {
    super(`no continuation observed for context [${prefix.map((x) => JSON.stringify(x)).join(", ")}]`);
    this.name = "UnseenContextError";
    this.prefix = prefix;
  }
}

export class UnsupportedDomainError extends Error {
  readonly domainSize: number;
  readonly alphabetSize: number;

  constructor(domainSize: number, alphabetSize: number) {
    super(`ciphertext uses ${domainSize} distinct symbols but only ${alphabetSize} plain letters exist`);
    this.name = "UnsupportedDomainError";
    this.domainSize = domainSize;
    this.alphabetSize = alphabetSize;
  }
}
