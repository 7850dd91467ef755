export {
  defaultFactory,
  descriptorOf,
  JsonFactory,
  JsonObjectParser,
  type Bindable,
  type Bound,
  type JsonFactoryOptions,
  type JsonObjectParserOptions,
} from "@/json/factory"
export { GenericJson, type JsonSerializer } from "@/json/generic-json"
