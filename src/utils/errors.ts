export class ContactsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContactsError';
  }
}

export class InvalidPhoneError extends ContactsError {
  constructor() {
    super('Phone number must be 10 digits');
    this.name = 'InvalidPhoneError';
  }
}

export class InvalidBirthdayError extends ContactsError {
  constructor() {
    super('Birthday must be in DD.MM.YYYY format');
    this.name = 'InvalidBirthdayError';
  }
}

export class InvalidNameError extends ContactsError {
  constructor() {
    super('Name must not be empty');
    this.name = 'InvalidNameError';
  }
}

export class MissingArgumentError extends ContactsError {
  constructor(message: string) {
    super(message);
    this.name = 'MissingArgumentError';
  }
}

export class ContactNotFoundError extends ContactsError {
  constructor() {
    super('Contact not found.');
    this.name = 'ContactNotFoundError';
  }
}

export class PhoneNotFoundError extends ContactsError {
  constructor() {
    super('Old phone number not found.');
    this.name = 'PhoneNotFoundError';
  }
}

export class BirthdayNotFoundError extends ContactsError {
  constructor() {
    super('Birthday not found for this contact.');
    this.name = 'BirthdayNotFoundError';
  }
}

export class InvalidCommandError extends ContactsError {
  constructor() {
    super('Invalid command.');
    this.name = 'InvalidCommandError';
  }
}

export class ConfigError extends Error {
  constructor(configPath: string, message: string) {
    super(`[${configPath}] ${message}`);
    this.name = 'ConfigError';
  }
}
