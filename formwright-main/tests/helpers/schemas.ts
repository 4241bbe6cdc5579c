import { form, option, selection } from "../../src/schema/nodes.js";
import type { FormNode, SelectionNode } from "../../src/schema/nodes.js";

export function doSelection(): SelectionNode {
  return selection({
    id: "do",
    description: "select what you want to do",
    options: [
      option({ id: "eat", description: "Specify that you want to eat", examples: ["I'm hungry", "I want to eat"] }),
      option({ id: "drink", description: "Specify that you want to drink", examples: ["I'm thirsty"] }),
      option({ id: "sleep", description: "Specify that you want to sleep", examples: ["I'm tired"] }),
    ],
  });
}

export function threeSelectionForm(): FormNode {
  return form({
    id: "plans",
    description: "what to do, what to watch and where to sit",
    elements: [
      doSelection(),
      selection({
        id: "watch",
        description: "select which movie you want to watch",
        options: [
          option({ id: "spy", description: "a secret agent thriller" }),
          option({ id: "truck", description: "toddler movie about a dump truck" }),
          option({ id: "alien", description: "horror movie about aliens in space" }),
        ],
      }),
      selection({
        id: "seat",
        description: "select where you want to sit",
        options: [
          option({ id: "aisle", description: "a seat next to the aisle" }),
          option({ id: "window", description: "a seat next to the window" }),
          option({ id: "middle", description: "a seat in the middle" }),
        ],
      }),
    ],
  });
}
