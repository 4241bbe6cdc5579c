export { option, selection, form, childrenOf, allowedTransitions, fieldIdsOf } from "./nodes.js";
export type { OptionNode, SelectionNode, FormNode, SchemaNode, SchemaNodeKind } from "./nodes.js";
export { InputTree, createInputTree } from "./input-tree.js";
export { parseSchemaDocument, loadSchemaFile } from "./document.js";
