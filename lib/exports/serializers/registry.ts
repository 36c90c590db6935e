import { ExportError } from '@/lib/exports/errors';
import { EXPORT_FORMATS, isExportFormat, type ExportFormat } from '@/lib/exports/options';
import { articySerializer } from '@/lib/exports/serializers/articy_xml';
import { godotSerializer } from '@/lib/exports/serializers/godot_json';
import { inkSerializer } from '@/lib/exports/serializers/ink';
import { nativeSerializer } from '@/lib/exports/serializers/native_json';
import type { Serializer } from '@/lib/exports/serializers/types';
import { unitySerializer } from '@/lib/exports/serializers/unity_json';
import { unrealSerializer } from '@/lib/exports/serializers/unreal_csv';
import { yarnSerializer } from '@/lib/exports/serializers/yarn';

const SERIALIZERS: Record<ExportFormat, Serializer> = {
  native: nativeSerializer,
  ink: inkSerializer,
  yarn: yarnSerializer,
  unity: unitySerializer,
  godot: godotSerializer,
  unreal: unrealSerializer,
  articy: articySerializer
};

export type GetSerializerResult = { ok: true; serializer: Serializer } | { ok: false; error: ExportError };

export function getSerializer(format: string): GetSerializerResult {
  if (!isExportFormat(format)) {
    return { ok: false, error: new ExportError('INVALID_FORMAT', `Unknown export format: ${format}`, { value: format }) };
  }
  return { ok: true, serializer: SERIALIZERS[format] };
}

export interface FormatInfo {
  format: ExportFormat;
  label: string;
  extension: string;
  contentType: string;
  sections: string[];
}

export function listFormats(): FormatInfo[] {
  return EXPORT_FORMATS.map((format) => {
    const serializer = SERIALIZERS[format];
    return {
      format,
      label: serializer.formatLabel(),
      extension: serializer.fileExtension(),
      contentType: serializer.contentType(),
      sections: serializer.supportedSections()
    };
  });
}
