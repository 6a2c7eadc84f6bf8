export { fromWireFormat, readRelationshipSets } from "./reader";
export {
  serializeRelationshipSets,
  toWireFormat,
  writeFileAtomic,
  writeRelationshipSets,
} from "./writer";
