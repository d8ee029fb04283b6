import type { FeatureCollection } from "geojson";
import { DatasetError, parseDataset } from "./medals.js";
import { isFeatureCollection } from "./geo.js";
import type { MedalSnapshot } from "./medals.js";

export type JsonGetter = (url: string) => Promise<unknown>;

export type MapData = {
  snapshot: MedalSnapshot;
  geo: FeatureCollection | null;
  notice: string | null;          // shown in the side panel when something failed
};

export const EMPTY_SNAPSHOT: MedalSnapshot = { countries: new Map(), metadata: null };

const reason = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * Loads the dataset and the boundary file independently. A failure in either
 * leaves the other usable: without medal data the map is drawn grey, without
 * boundaries only the base tiles are shown.
 */
export async function loadMapData(getJson: JsonGetter, urls: { data: string; geo: string }): Promise<MapData> {
  const [data, geo] = await Promise.allSettled([getJson(urls.data), getJson(urls.geo)]);
  const notices: string[] = [];

  let snapshot = EMPTY_SNAPSHOT;
  if (data.status === "rejected") {
    console.error(data.reason);
    notices.push(`Medal data could not be loaded from ${urls.data} (${reason(data.reason)}). The map is shown without data.`);
  } else {
    try {
      snapshot = parseDataset(data.value);
    } catch (e) {
      if (!(e instanceof DatasetError)) throw e;
      console.error(e);
      notices.push(`Medal data in ${urls.data} is malformed (${e.message}). The map is shown without data.`);
    }
  }

  let boundaries: FeatureCollection | null = null;
  if (geo.status === "rejected") {
    console.error(geo.reason);
    notices.push(`Country boundaries could not be loaded from ${urls.geo} (${reason(geo.reason)}).`);
  } else if (isFeatureCollection(geo.value)) {
    boundaries = geo.value;
  } else {
    notices.push(`${urls.geo} is not a GeoJSON FeatureCollection.`);
  }

  return { snapshot, geo: boundaries, notice: notices.length ? notices.join(" ") : null };
}
