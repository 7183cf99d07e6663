import { Birthday, Name, Phone } from './fields.js';

export class ContactRecord {
  readonly name: Name;
  phones: Phone[] = [];
  birthday?: Birthday;

  constructor(name: string, birthday?: string) {
    this.name = new Name(name);
    if (birthday !== undefined) this.birthday = new Birthday(birthday);
  }

  addPhone(value: string): void {
    this.phones.push(new Phone(value));
  }

  /** Removes every phone equal to `value`. Does nothing when none match. */
  removePhone(value: string): void {
    this.phones = this.phones.filter(p => p.value !== value);
  }

  /**
   * Replaces the first phone equal to `oldValue`. The replacement is validated
   * before anything changes, so a rejected number leaves the record as it was.
   * Returns false when no phone matched.
   */
  editPhone(oldValue: string, newValue: string): boolean {
    const index = this.phones.findIndex(p => p.value === oldValue);
    if (index === -1) return false;
    this.phones[index] = new Phone(newValue);
    return true;
  }

  findPhone(value: string): Phone | undefined {
    return this.phones.find(p => p.value === value);
  }

  addBirthday(value: string): void {
    this.birthday = new Birthday(value);
  }

  toString(): string {
    const phones = this.phones.map(p => p.toString()).join(', ');
    const birthday = this.birthday ? `, birthday: ${this.birthday}` : '';
    return `Contact name: ${this.name.value}, phones: ${phones}${birthday}`;
  }
}
