export {
  defineResource,
  ResourceDefinition,
  RESERVED_FIELD_NAMES,
  type AttributeName,
  type FieldDescriptor,
  type FieldShape,
  type MergeFields,
  type ResourceDefinitionOptions,
  type ResourceInput,
} from "@/resource/definition"
export { ResourceInstance } from "@/resource/instance"
export { allAttributes, onlyAttributes, type AttributeSelector } from "@/resource/selector"
export { render, dump, identifier, type RenderOptions, type DumpOptions } from "@/resource/render"
export { buildDocument, dumpDocument, type DocumentOptions } from "@/resource/document"
export { attributeNames, fieldSchemas } from "@/resource/introspection"
