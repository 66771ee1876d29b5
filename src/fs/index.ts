export { readArchiveFile } from "./read";
