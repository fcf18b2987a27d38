/**
 * Output formatting for answers, errors, history and static help text
 */

import type { CalcResult } from "./calc/index.ts";
import type { HistoryEntry } from "./history.ts";

export interface OutputFormatter {
  formatNumber(value: CalcResult): string;
  formatResult(value: CalcResult, query?: string): string;
  formatError(message: string): string;
  formatParsingError(): string;
  formatHistory(entries: readonly HistoryEntry[]): string;
  formatHelp(): string;
  formatWelcome(): string;
  formatGoodbye(): string;
}

const HISTORY_RULE = "─".repeat(60);

/**
 * Whole floats print without a decimal point; everything else is rounded to
 * 6 decimal places with trailing zeros dropped. Bigints print in full.
 */
export function formatNumber(value: CalcResult): string {
  if (typeof value === "bigint") return value.toString();
  if (Number.isInteger(value)) {
    // String() switches to exponent notation past 1e21
    return Math.abs(value) < 1e21 ? String(value) : BigInt(value).toString();
  }
  // Number() drops trailing zeros; -0 prints as "0"
  return String(Number(value.toFixed(6)));
}

const HELP_TEXT = `Available Operations:
─────────────────────

Basic Arithmetic:
  • Addition: "What's 5 + 3?", "Add 10 and 20"
  • Subtraction: "10 minus 3", "Subtract 3 from 10"
  • Multiplication: "5 times 4", "Multiply 6 and 7"
  • Division: "Divide 20 by 5", "What's 100 / 4?"

Powers and Roots:
  • Power: "2 to the power of 3", "2 ^ 10", "5 squared", "4 cubed"
  • Square root: "Square root of 81", "sqrt(144)"
  • Cube root: "Cube root of 27"

Trigonometry (angles in degrees):
  • "sin of 30 degrees", "cos(45)", "tan of 60"

Logarithms:
  • "log of 100", "ln(5)"

Factorials:
  • "5 factorial", "factorial of 7", "6!"

Special Commands:
  • 'history' - Show calculation history
  • 'clear' - Clear calculation history
  • 'help' - Show this help message
  • 'quit' - Exit the program`;

const WELCOME_TEXT = `╔════════════════════════════════════════════════════════════╗
║          Welcome to Calculator Agent!                      ║
║                                                            ║
║  I can help you with mathematical calculations.            ║
║  Just ask me naturally, like:                              ║
║    • "What's 25 + 17?"                                     ║
║    • "Calculate square root of 144"                        ║
║    • "What's 5 squared?"                                   ║
║    • "sin of 30 degrees"                                   ║
║                                                            ║
║  Type 'help' for more examples                             ║
║  Type 'history' to see past calculations                   ║
║  Type 'quit' to exit                                       ║
╚════════════════════════════════════════════════════════════╝`;

const PARSING_ERROR_TEXT = `I couldn't understand that question. Please try again.

Examples of questions I can answer:
  • "What's 2 + 2?"
  • "Calculate square root of 144"
  • "What's 5 squared?"

Type 'help' for more examples.`;

export class TextFormatter implements OutputFormatter {
  formatNumber(value: CalcResult): string {
    return formatNumber(value);
  }

  formatResult(value: CalcResult, _query = ""): string {
    return `The answer is ${formatNumber(value)}`;
  }

  formatError(message: string): string {
    return `Error: ${message}`;
  }

  formatParsingError(): string {
    return PARSING_ERROR_TEXT;
  }

  formatHistory(entries: readonly HistoryEntry[]): string {
    if (entries.length === 0) {
      return "No calculation history yet.";
    }

    const lines = ["Calculation History:", HISTORY_RULE];
    entries.forEach((entry, i) => {
      lines.push(`${i + 1}. ${entry.query} = ${entry.result}`);
    });
    return lines.join("\n");
  }

  formatHelp(): string {
    return HELP_TEXT;
  }

  formatWelcome(): string {
    return WELCOME_TEXT;
  }

  formatGoodbye(): string {
    return "Thank you for using Calculator Agent! Goodbye! 👋";
  }
}
