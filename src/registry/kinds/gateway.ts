/**
 * Built-in Kind: Gateway
 * Transparent node; its inputs and outputs share context keys
 */

import { registerNodeKind } from "../registry";

registerNodeKind(
  "GATEWAY",
  "Passes its input ports through unchanged.",
  (metamodel, context, scope) => {
    const present = metamodel.inputPorts.filter((port) => context.has(port.key));
    scope.log(
      `Gateway passed ${present.length}/${metamodel.inputPorts.length} port(s)`,
    );
  },
);
