export { type CalculatorTools, createCalculatorTools } from "./calculator.ts";
