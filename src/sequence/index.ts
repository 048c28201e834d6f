export { type Translation, translateDna } from "./genetic-code";
export { inferSequenceType, SequenceType } from "./sequence-type";
