export { runCli, defaultIo, type CliIo } from "./cli";
export {
  parseVariablesFile,
  parseVariableFlag,
  VariableBindingError,
  JsonValueSchema,
  VariablesFileSchema,
  type VariablesFile,
} from "./variables";
