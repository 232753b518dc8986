/**
 * Indented Text Formatting
 * @module reporting/formatter
 */

/**
 * Presentation hint carried by scope, test and info events
 */
export interface IndentedText {
  readonly formattedText: string;
  readonly rawText: string;
  readonly indentationLevel: number;
}

const INDENT = '  ';

function indent(level: number): string {
  return INDENT.repeat(Math.max(0, level));
}

export function indentedTextForScope(text: string, level: number): IndentedText {
  return { formattedText: `${indent(level)}${text}`, rawText: text, indentationLevel: level };
}

export function indentedTextForTest(testText: string, level: number, includeIcon: boolean): IndentedText {
  const icon = includeIcon ? '- ' : '';
  return { formattedText: `${indent(level)}${icon}${testText}`, rawText: testText, indentationLevel: level };
}

export function indentedTextForInfo(message: string, level: number, includeIcon: boolean): IndentedText {
  const icon = includeIcon ? '+ ' : '';
  return { formattedText: `${indent(level)}${icon}${message}`, rawText: message, indentationLevel: level };
}
