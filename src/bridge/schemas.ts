import { lenientDateToIso } from './dates.js';
import {
  TOKENS,
  extractPreview,
  flagField,
  nullableIntegerField,
  optionalField,
  requiredField,
  splitAddresses,
  splitLabeled,
  type LabeledValue,
  type PostalAddress,
  type RecordSchema,
} from './decoder.js';

// ============================================================================
// Contact
// ============================================================================

export interface Contact {
  id: string;
  displayName: string;
  firstName: string;
  lastName: string;
  phones: LabeledValue[];
  emails: LabeledValue[];
  addresses: PostalAddress[];
  birthday?: string;
  notes?: string;
  organization?: string;
}

// id, display name, first, last, phones, emails, addresses, birthday, notes, organization
export const contactSchema: RecordSchema<Contact> = {
  entity: 'contact',
  minFields: 10,
  build(fields) {
    const contact: Contact = {
      id: requiredField(fields, 0, 'id'),
      displayName: fields[1].trim(),
      firstName: fields[2].trim(),
      lastName: fields[3].trim(),
      phones: splitLabeled(fields[4], TOKENS.phoneItem),
      emails: splitLabeled(fields[5], TOKENS.emailItem),
      addresses: splitAddresses(fields[6], TOKENS.addressItem),
    };
    const birthday = optionalField(fields, 7);
    const notes = optionalField(fields, 8);
    const organization = optionalField(fields, 9);
    if (birthday) contact.birthday = lenientDateToIso(birthday);
    if (notes) contact.notes = notes;
    if (organization) contact.organization = organization;
    return contact;
  },
};

// ============================================================================
// Note
// ============================================================================

export interface Note {
  id: string;
  name: string;
  body: string;
  preview: string;
  modificationDate: string;
  folder: string;
  creationDate?: string;
}

// id, name, body, modification date, folder?, creation date?
export const noteSchema: RecordSchema<Note> = {
  entity: 'note',
  minFields: 4,
  build(fields) {
    const body = fields[2].trim();
    const note: Note = {
      id: requiredField(fields, 0, 'id'),
      name: fields[1].trim(),
      body,
      preview: extractPreview(body),
      modificationDate: lenientDateToIso(fields[3]),
      folder: optionalField(fields, 4) ?? '',
    };
    const created = optionalField(fields, 5);
    if (created) note.creationDate = lenientDateToIso(created);
    return note;
  },
};

// ============================================================================
// Reminder
// ============================================================================

export interface Reminder {
  id: string;
  title: string;
  completed: boolean;
  dueDate: string | null;
  priority: number | null;
  notes?: string;
  list?: string;
}

// id, title, completed, due date, priority, notes?, list?
export const reminderSchema: RecordSchema<Reminder> = {
  entity: 'reminder',
  minFields: 5,
  build(fields) {
    const due = optionalField(fields, 3);
    const reminder: Reminder = {
      id: requiredField(fields, 0, 'id'),
      title: fields[1].trim(),
      completed: flagField(fields, 2),
      dueDate: due && due !== 'null' ? lenientDateToIso(due) : null,
      priority: nullableIntegerField(fields, 4, 'priority'),
    };
    const notes = optionalField(fields, 5);
    const list = optionalField(fields, 6);
    if (notes) reminder.notes = notes;
    if (list) reminder.list = list;
    return reminder;
  },
};

// ============================================================================
// Calendar Event
// ============================================================================

export interface CalendarEvent {
  id: string;
  summary: string;
  startDate: string;
  endDate: string;
  location?: string;
  description?: string;
  allDay: boolean;
  calendar?: string;
}

// id, summary, start, end, location?, description?, all day?, calendar?
export const eventSchema: RecordSchema<CalendarEvent> = {
  entity: 'event',
  minFields: 4,
  build(fields) {
    const event: CalendarEvent = {
      id: requiredField(fields, 0, 'id'),
      summary: fields[1].trim(),
      startDate: lenientDateToIso(fields[2]),
      endDate: lenientDateToIso(fields[3]),
      allDay: flagField(fields, 6),
    };
    const location = optionalField(fields, 4);
    const description = optionalField(fields, 5);
    const calendar = optionalField(fields, 7);
    if (location) event.location = location;
    if (description) event.description = description;
    if (calendar) event.calendar = calendar;
    return event;
  },
};

// ============================================================================
// Conversation
// ============================================================================

export interface Conversation {
  id: string;
  displayName: string;
  isGroupChat: boolean;
  participants: string[];
}

// id, display name, group flag, comma-joined participant handles
export const conversationSchema: RecordSchema<Conversation> = {
  entity: 'conversation',
  minFields: 4,
  build(fields) {
    return {
      id: requiredField(fields, 0, 'id'),
      displayName: fields[1].trim(),
      isGroupChat: flagField(fields, 2),
      participants: fields[3]
        .split(',')
        .map((handle) => handle.trim())
        .filter((handle) => handle.length > 0),
    };
  },
};

// ============================================================================
// Message
// ============================================================================

export interface Message {
  id: string;
  sender: string;
  date: string;
  text: string;
}

// id, sender handle, date sent, text
export const messageSchema: RecordSchema<Message> = {
  entity: 'message',
  minFields: 4,
  build(fields) {
    return {
      id: requiredField(fields, 0, 'id'),
      sender: fields[1].trim(),
      date: lenientDateToIso(fields[2]),
      text: fields[3].trim(),
    };
  },
};
