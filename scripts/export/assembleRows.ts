import { toCamelot } from "../../src/lib/camelot.js";
import type { Logger } from "../logger.js";
import type { AudioFeatures, BaseRow, ExportRow, FeatureValues } from "../types.js";

const NO_FEATURES: FeatureValues = {
  tempo: null,
  key: null,
  mode: null,
  danceability: null,
  energy: null,
  valence: null,
  acousticness: null,
  instrumentalness: null,
  liveness: null,
  speechiness: null,
  timeSignature: null,
};

function featureValues(features: AudioFeatures | undefined): FeatureValues {
  if (!features) return NO_FEATURES;
  const { id: _id, ...values } = features;
  return values;
}

export function assembleRows(
  baseRows: BaseRow[],
  featuresById: ReadonlyMap<string, AudioFeatures>,
  logger: Logger,
): ExportRow[] {
  const rows = baseRows.map((row): ExportRow => {
    const values = featureValues(featuresById.get(row.trackId));
    return {
      ...row,
      ...values,
      camelot: toCamelot(values.key, values.mode),
    };
  });

  logger.info(`Final rows assembled: ${rows.length}`);
  return rows;
}
