import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { contactSchema } from '../bridge/schemas.js';
import type { ResponseEnvelope } from '../bridge/types.js';
import { DELIMITER_PROPERTIES, TEXT_OR_EMPTY, guarded } from './applescript.js';
import { asNumber, asString, required, runAppScript, type ToolContext } from './args.js';

// ============================================================================
// Scripts
// ============================================================================

// id, display name, first, last, phones, emails, addresses, birthday, notes, organization
const CONTACT_LINE = `
on contactLine(p)
  tell application "Contacts"
    set phoneInfo to ""
    repeat with ph in phones of p
      set phoneLabel to my textOrEmpty(label of ph)
      if phoneLabel is "" then set phoneLabel to "other"
      set phoneInfo to phoneInfo & phoneLabel & ":" & (value of ph) & phoneDelim
    end repeat

    set emailInfo to ""
    repeat with em in emails of p
      set emailLabel to my textOrEmpty(label of em)
      if emailLabel is "" then set emailLabel to "other"
      set emailInfo to emailInfo & emailLabel & ":" & (value of em) & emailDelim
    end repeat

    set addressInfo to ""
    repeat with ad in addresses of p
      set addressLabel to my textOrEmpty(label of ad)
      if addressLabel is "" then set addressLabel to "other"
      set addressInfo to addressInfo & addressLabel & ":"
      if street of ad is not missing value then set addressInfo to addressInfo & "street:" & (street of ad) & ","
      if city of ad is not missing value then set addressInfo to addressInfo & "city:" & (city of ad) & ","
      if state of ad is not missing value then set addressInfo to addressInfo & "state:" & (state of ad) & ","
      if zip of ad is not missing value then set addressInfo to addressInfo & "zip:" & (zip of ad) & ","
      if country of ad is not missing value then set addressInfo to addressInfo & "country:" & (country of ad) & ","
      set addressInfo to addressInfo & addressDelim
    end repeat

    set birthdayInfo to my textOrEmpty(birth date of p)
    return (id of p) & fieldDelim & my textOrEmpty(name of p) & fieldDelim & my textOrEmpty(first name of p) & fieldDelim & my textOrEmpty(last name of p) & fieldDelim & phoneInfo & fieldDelim & emailInfo & fieldDelim & addressInfo & fieldDelim & birthdayInfo & fieldDelim & my textOrEmpty(note of p) & fieldDelim & my textOrEmpty(organization of p)
  end tell
end contactLine
`;

const DIGITS_ONLY = `
on digitsOnly(theText)
  set out to ""
  repeat with c in characters of theText
    if "0123456789" contains (c as string) then set out to out & (c as string)
  end repeat
  return out
end digitsOnly
`;

const SEARCH_BY_NAME_SCRIPT = `${DELIMITER_PROPERTIES}${guarded(`
    set searchName to $name
    set maxResults to $limit
    tell application "Contacts"
      set matches to (every person whose name contains searchName)
    end tell
    set totalFound to count of matches
    set resultText to ""
    repeat with i from 1 to totalFound
      if i > maxResults then exit repeat
      set resultText to resultText & itemDelim & my contactLine(item i of matches)
    end repeat
    return (totalFound as string) & resultText`)}${CONTACT_LINE}${TEXT_OR_EMPTY}`;

const SEARCH_BY_PHONE_SCRIPT = `${DELIMITER_PROPERTIES}${guarded(`
    set searchDigits to $digits
    set maxResults to $limit
    set matches to {}
    tell application "Contacts"
      repeat with p in people
        repeat with ph in phones of p
          if my digitsOnly(value of ph) contains searchDigits then
            set end of matches to contents of p
            exit repeat
          end if
        end repeat
      end repeat
    end tell
    set totalFound to count of matches
    set resultText to ""
    repeat with i from 1 to totalFound
      if i > maxResults then exit repeat
      set resultText to resultText & itemDelim & my contactLine(item i of matches)
    end repeat
    return (totalFound as string) & resultText`)}${CONTACT_LINE}${DIGITS_ONLY}${TEXT_OR_EMPTY}`;

// ============================================================================
// Tool Definitions
// ============================================================================

export const contactTools: Tool[] = [
  {
    name: 'contacts_search_by_name',
    description: 'Search contacts whose name contains the given text.',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Name or part of a name' },
        limit: { type: 'number', description: 'Maximum results (default: 10)' },
      },
      required: ['name'],
    },
  },
  {
    name: 'contacts_search_by_phone',
    description: 'Search contacts by phone number. Formatting characters are ignored.',
    inputSchema: {
      type: 'object',
      properties: {
        phone: { type: 'string', description: 'Phone number or part of one' },
        limit: { type: 'number', description: 'Maximum results (default: 10)' },
      },
      required: ['phone'],
    },
  },
];

// ============================================================================
// Tool Handler
// ============================================================================

export async function handleContactTool(
  name: string,
  args: Record<string, unknown>,
  ctx: ToolContext
): Promise<ResponseEnvelope | undefined> {
  switch (name) {
    case 'contacts_search_by_name': {
      const search = required('name', asString(args.name));
      return runAppScript(
        ctx,
        SEARCH_BY_NAME_SCRIPT,
        { name: search, limit: asNumber(args.limit) ?? 10 },
        { schema: contactSchema }
      );
    }

    case 'contacts_search_by_phone': {
      const phone = required('phone', asString(args.phone));
      const digits = phone.replace(/\D/g, '');
      if (!digits) throw new Error('phone must contain at least one digit');
      return runAppScript(
        ctx,
        SEARCH_BY_PHONE_SCRIPT,
        { digits, limit: asNumber(args.limit) ?? 10 },
        { schema: contactSchema }
      );
    }

    default:
      return undefined;
  }
}
