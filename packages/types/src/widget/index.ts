export type {
    ParameterType,
    ITextParameterSpec,
    INumberParameterSpec,
    IDateParameterSpec,
    IEnumOption,
    IEnumParameterSpec,
    IBooleanParameterSpec,
    IParameterSpec,
    ParameterValue,
    ResolvedParameters
} from './IParameterSpec.js';
export type { ColumnType, ColumnFormat, IColumnPresentation, IColumnSpec, IColumnMetadata } from './IColumnSpec.js';
export type {
    WidgetType,
    IParameterReference,
    IProviderSource,
    ILocalSource,
    WidgetSource,
    IGridData,
    IWidgetDescriptor,
    IWidgetManifestEntry
} from './IWidgetDescriptor.js';
