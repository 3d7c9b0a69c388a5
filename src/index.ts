export { tabula } from "./tabula";
export { layers, MemoryLayer, SqliteLayer } from "./sources";

export { Session } from "./core/session";
export type { SessionOptions } from "./core/session";
export { PersistedList } from "./core/list";
export { ObjectTable, ObjectHandle } from "./core/objectTable";
export type { PropertyValue } from "./core/objectTable";
export { ResultsView, allObjects } from "./core/results";
export type { ResultsSource } from "./core/results";
export { AccessorContext, isValueSet } from "./core/accessor";
export type { ObjectReference, ValueSet, EngineHandle } from "./core/accessor";
export { ObjectSchema } from "./core/schema";
export type {
    ObjectSchemaInput,
    PropertySchema,
    PropertyType,
    ScalarPropertySchema,
    ListPropertySchema,
    ObjectPropertySchema,
    DefaultValue,
} from "./core/schema";
export { IndexSet } from "./core/indexSet";
export { ObservationRegistry, ObservationInfo } from "./core/observation";
export type {
    ChangeKind,
    ListObserver,
    NotificationToken,
    ObservationKey,
    ChangeBracket,
} from "./core/observation";
export { changeList, changeAt, changeRange, changeSet } from "./core/changeList";
export type { ChangeTarget } from "./core/changeList";
export { setAt, getAt, findFirst } from "./core/dispatcher";
export type { CellAddress } from "./core/dispatcher";
export { NOT_FOUND, COLUMN_TYPES, PRIMITIVE_COLUMN_TYPES } from "./core/columnType";
export type { ColumnType, PrimitiveColumnType, ColumnSpec, Timestamp } from "./core/columnType";
export type { CallerValue } from "./core/values";
export {
    TabulaError,
    OutOfRangeError,
    InvalidatedStateError,
    TypeMismatchError,
    UnsupportedTypeError,
    UnsupportedOperationError,
    InternalInconsistencyError,
    WriteTransactionError,
    StorageError,
    translateErrors,
} from "./core/errors";
export type { TabulaErrorCode } from "./core/errors";
export type { TableHandle, StorageLayer } from "./sources/tableHandle";
