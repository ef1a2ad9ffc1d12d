/**
 * Pipeline modules export
 */

export { read } from "./reader";
export { process } from "./processor";
export { write } from "./writer";
export { typeset } from "./typesetter";
export { summary } from "./summary";
