import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { isoToAppleScriptDate } from '../bridge/dates.js';
import { eventSchema } from '../bridge/schemas.js';
import type { ResponseEnvelope } from '../bridge/types.js';
import { DELIMITER_PROPERTIES, JSON_STRING, TEXT_OR_EMPTY, guarded } from './applescript.js';
import {
  asBoolean,
  asNumber,
  asString,
  guard,
  required,
  runAppScript,
  type ToolContext,
} from './args.js';

const LIST_CALENDARS_SCRIPT = `${guarded(`
    tell application "Calendar"
      set output to "["
      set allCalendars to calendars
      repeat with i from 1 to count of allCalendars
        set cal to item i of allCalendars
        if i > 1 then set output to output & ","
        set output to output & "{\\"name\\":" & my jsonString(name of cal) & ",\\"description\\":" & my jsonString(description of cal) & ",\\"writable\\":" & ((writable of cal) as string) & "}"
      end repeat
      return output & "]"
    end tell`)}${JSON_STRING}`;

// id, summary, start, end, location, description, all day, calendar
const LIST_EVENTS_SCRIPT = `${DELIMITER_PROPERTIES}${guarded(`
    set maxResults to $limit
    set fromText to $start_date
    set toText to $end_date
    set fromDate to missing value
    set toDate to missing value
    if fromText is not missing value then set fromDate to date fromText
    if toText is not missing value then set toDate to date toText
    tell application "Calendar"
      set theCalendar to calendar $calendar_name
      set calendarName to name of theCalendar
      if fromDate is missing value and toDate is missing value then
        set theEvents to events of theCalendar
      else if toDate is missing value then
        set theEvents to (events of theCalendar whose start date is greater than or equal to fromDate)
      else if fromDate is missing value then
        set theEvents to (events of theCalendar whose start date is less than or equal to toDate)
      else
        set theEvents to (events of theCalendar whose start date is greater than or equal to fromDate and start date is less than or equal to toDate)
      end if
      set totalFound to count of theEvents
      set resultText to ""
      repeat with i from 1 to totalFound
        if i > maxResults then exit repeat
        set e to item i of theEvents
        set resultText to resultText & itemDelim & (uid of e) & fieldDelim & my textOrEmpty(summary of e) & fieldDelim & ((start date of e) as string) & fieldDelim & ((end date of e) as string) & fieldDelim & my textOrEmpty(location of e) & fieldDelim & my textOrEmpty(description of e) & fieldDelim & ((allday event of e) as string) & fieldDelim & calendarName
      end repeat
    end tell
    return (totalFound as string) & resultText`)}${TEXT_OR_EMPTY}`;

const CREATE_EVENT_SCRIPT = guarded(`
    set startDate to date $start_date
    set endDate to date $end_date
    set eventLocation to $location
    set eventDescription to $description
    tell application "Calendar"
      set theCalendar to calendar $calendar_name
      set newEvent to make new event at end of events of theCalendar with properties {summary:$summary, start date:startDate, end date:endDate, allday event:$all_day}
      if eventLocation is not missing value then set location of newEvent to eventLocation
      if eventDescription is not missing value then set description of newEvent to eventDescription
      return uid of newEvent
    end tell`);

export const calendarTools: Tool[] = [
  {
    name: 'calendar_list_calendars',
    description: 'List all calendars.',
    inputSchema: { type: 'object', properties: {}, required: [] },
  },
  {
    name: 'calendar_list_events',
    description: 'List events in a calendar, optionally within a date range.',
    inputSchema: {
      type: 'object',
      properties: {
        calendar_name: { type: 'string', description: 'Calendar name' },
        limit: { type: 'number', description: 'Maximum events to return (default: 50)' },
        start_date: {
          type: 'string',
          description: 'Only events starting at or after this ISO date (optional)',
        },
        end_date: {
          type: 'string',
          description: 'Only events starting at or before this ISO date (optional)',
        },
      },
      required: ['calendar_name'],
    },
  },
  {
    name: 'calendar_create_event',
    description: 'Create an event in a calendar.',
    inputSchema: {
      type: 'object',
      properties: {
        calendar_name: { type: 'string', description: 'Calendar name' },
        summary: { type: 'string', description: 'Event title' },
        start_date: { type: 'string', description: 'Start, YYYY-MM-DDTHH:MM:SS or YYYY-MM-DD' },
        end_date: { type: 'string', description: 'End, YYYY-MM-DDTHH:MM:SS or YYYY-MM-DD' },
        location: { type: 'string', description: 'Location (optional)' },
        description: { type: 'string', description: 'Description (optional)' },
        all_day: { type: 'boolean', description: 'All-day event (default: false)' },
      },
      required: ['calendar_name', 'summary', 'start_date', 'end_date'],
    },
  },
];

function optionalDate(iso: string | undefined): string | null {
  return iso === undefined ? null : isoToAppleScriptDate(iso);
}

export async function handleCalendarTool(
  name: string,
  args: Record<string, unknown>,
  ctx: ToolContext
): Promise<ResponseEnvelope | undefined> {
  switch (name) {
    case 'calendar_list_calendars':
      return runAppScript(ctx, LIST_CALENDARS_SCRIPT, {});

    case 'calendar_list_events': {
      const calendarName = required('calendar_name', asString(args.calendar_name));
      return guard(() =>
        runAppScript(
          ctx,
          LIST_EVENTS_SCRIPT,
          {
            calendar_name: calendarName,
            limit: asNumber(args.limit) ?? 50,
            start_date: optionalDate(asString(args.start_date)),
            end_date: optionalDate(asString(args.end_date)),
          },
          { schema: eventSchema, timeoutSeconds: Math.max(ctx.config.defaultTimeoutSeconds, 60) }
        )
      );
    }

    case 'calendar_create_event': {
      const calendarName = required('calendar_name', asString(args.calendar_name));
      const summary = required('summary', asString(args.summary));
      const startDate = required('start_date', asString(args.start_date));
      const endDate = required('end_date', asString(args.end_date));
      return guard(() =>
        runAppScript(
          ctx,
          CREATE_EVENT_SCRIPT,
          {
            calendar_name: calendarName,
            summary,
            start_date: isoToAppleScriptDate(startDate),
            end_date: isoToAppleScriptDate(endDate),
            location: asString(args.location),
            description: asString(args.description),
            all_day: asBoolean(args.all_day) ?? false,
          },
          { format: 'text' }
        )
      );
    }

    default:
      return undefined;
  }
}
