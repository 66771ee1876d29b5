export {
	AR_HEADER,
	HEADER_SIZE,
	HEADER_TERMINATOR,
	MAGIC,
	PADDING_BYTE,
	SPECIAL_MEMBER,
} from "./constants";
export { ByteCursor } from "./cursor";
export {
	ArchiveError,
	type ArchiveErrorCode,
	type ArchiveErrorDetails,
} from "./errors";
export { ArchiveReader } from "./reader";
export type {
	ArchiveData,
	ArchiveDiagnostic,
	DuplicateLongNamesDiagnostic,
	HeaderTerminatorDiagnostic,
	Member,
	MissingSecondIndexDiagnostic,
	PaddingDiagnostic,
	ReaderOptions,
} from "./types";
