export {
  createEntityDictionary,
  EntityDictionary,
} from "./entity-dictionary";
