/**
 * Built-in node kinds (side effects: registers kinds)
 */

import "./gateway";
import "./cyclic";

export { ITERATION_KEY } from "./cyclic";
