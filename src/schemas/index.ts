export {
  SearchOptionsInputSchema,
  type SearchOptionsInput,
} from './inputs/search.js';
export { CliArgsSchema, type CliArgs } from './inputs/cli.js';
