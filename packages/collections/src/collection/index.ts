export { OwnedCollection } from "./OwnedCollection.js";
