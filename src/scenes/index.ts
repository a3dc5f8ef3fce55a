export { CalculatorScene } from "./CalculatorScene";
