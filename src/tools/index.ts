export { analyzeExpressionTool, checkValueTool } from "./expression.ts";
