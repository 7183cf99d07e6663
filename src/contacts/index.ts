export { Name, Phone, Birthday, phoneSchema, birthdaySchema, BIRTHDAY_FORMAT } from './fields.js';
export { ContactRecord } from './record.js';
export { AddressBook } from './address-book.js';
export { projectOntoYear, isWithinWindow, DEFAULT_BIRTHDAY_WINDOW_DAYS } from './birthdays.js';
