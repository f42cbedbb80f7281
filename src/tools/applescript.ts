// AppleScript handlers shared by the app scripts. Append them after `end run`.

export const DELIMITER_PROPERTIES = `
property fieldDelim : "<<|>>"
property itemDelim : "<<||>>"
property phoneDelim : "<<+++>>"
property emailDelim : "<<===>>>"
property addressDelim : "<<***>>"
`;

export const TEXT_OR_EMPTY = `
on textOrEmpty(theValue)
  if theValue is missing value then return ""
  return theValue as string
end textOrEmpty
`;

export const REPLACE_TEXT = `
on replaceText(theText, searchStr, replaceStr)
  set AppleScript's text item delimiters to searchStr
  set theItems to text items of theText
  set AppleScript's text item delimiters to replaceStr
  set theText to theItems as text
  set AppleScript's text item delimiters to ""
  return theText
end replaceText
`;

export const JSON_STRING = `
on jsonString(theValue)
  set theText to my textOrEmpty(theValue)
  set theText to my replaceText(theText, "\\\\", "\\\\\\\\")
  set theText to my replaceText(theText, "\\"", "\\\\\\"")
  set theText to my replaceText(theText, return, "\\\\n")
  set theText to my replaceText(theText, linefeed, "\\\\n")
  return "\\"" & theText & "\\""
end jsonString
${TEXT_OR_EMPTY}${REPLACE_TEXT}`;

/** Wrap a `tell` body so failures come back through the `ERROR:` channel. */
export function guarded(body: string): string {
  return `
on run
  try
${body}
  on error errorMessage
    return "ERROR:" & errorMessage
  end try
end run
`;
}
