export { interpret, describeIntent } from "./interpreter.js";
export { cleanPathToken, unquote, hasPathShape } from "./tokens.js";
