import "./style.css";
import "leaflet/dist/leaflet.css";
import * as L from "leaflet";
import type { Feature, FeatureCollection } from "geojson";
import { FILTERS, colorScale, parseFilter } from "./medals.js";
import type { ColorScale, Filter, MedalSnapshot } from "./medals.js";
import { featureIso3, featureName } from "./geo.js";
import { loadMapData } from "./load.js";
import { renderCoverage, renderDetail, renderLegend, renderNotice } from "./panel.js";

const DATA_URL = "./medals.json";
const GEO_URL = "./countries.geo.json";

const app = document.querySelector<HTMLDivElement>("#app");
if (!app) {
  throw new Error("Missing #app container");
}

app.innerHTML = `
  <div class="app">
    <header class="top-bar">
      <div class="brand">
        <div class="brand-title">Olympiad Medal Map</div>
        <div class="brand-subtitle" id="coverage">IMO · IOI · IPhO</div>
      </div>
      <div class="filters" id="filters">
        ${FILTERS.map(f => `<button class="filter-btn" type="button" data-filter="${f}">${f}</button>`).join("")}
      </div>
    </header>
    <main class="main">
      <section id="map" class="map"></section>
      <aside class="info">
        <div id="detail" class="info-body">Loading medal data...</div>
        <div id="legend"></div>
      </aside>
    </main>
  </div>
`;

function element(selector: string): HTMLElement {
  const el = app?.querySelector<HTMLElement>(selector);
  if (!el) throw new Error(`Missing ${selector}`);
  return el;
}

const detailEl = element("#detail");
const legendEl = element("#legend");
const filtersEl = element("#filters");
const coverageEl = element("#coverage");

const map = L.map("map", { zoomControl: true, worldCopyJump: true, minZoom: 2 }).setView([25, 10], 2);

L.tileLayer("https://{s}.basemaps.cartocdn.com/light_nolabels/{z}/{x}/{y}{r}.png", {
  attribution: "&copy; OpenStreetMap contributors &copy; CARTO",
  subdomains: "abcd",
  maxZoom: 8,
}).addTo(map);

function readFilterFromUrl(): Filter {
  return parseFilter(new URLSearchParams(window.location.search).get("olympiad"));
}

function writeFilterToUrl(filter: Filter) {
  const params = new URLSearchParams(window.location.search);
  if (filter === "All") params.delete("olympiad");
  else params.set("olympiad", filter);
  const query = params.toString();
  window.history.replaceState(null, "", query ? `?${query}` : window.location.pathname);
}

async function getJson(url: string): Promise<unknown> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`${url}: ${response.status} ${response.statusText}`);
  }
  return response.json();
}

function mountMap(snapshot: MedalSnapshot, geo: FeatureCollection, initial: Filter, notice: string | null) {
  let filter = initial;
  let scale: ColorScale = colorScale(snapshot, filter);

  const styleFor = (feature?: Feature): L.PathOptions => ({
    fillColor: feature ? scale.colorOf(featureIso3(feature)) : scale.colorOf(null),
    fillOpacity: 0.85,
    color: "#ffffff",
    weight: 0.8,
  });

  const showDetail = (feature: Feature) => {
    detailEl.innerHTML = renderDetail(snapshot, featureIso3(feature), featureName(feature), filter);
  };

  const layer = L.geoJSON(geo, {
    style: styleFor,
    onEachFeature: (feature, featureLayer) => {
      featureLayer.on({
        mouseover: () => {
          if (featureLayer instanceof L.Path) featureLayer.setStyle({ weight: 2, color: "#333333" });
          showDetail(feature);
        },
        mouseout: () => {
          if (featureLayer instanceof L.Path) featureLayer.setStyle(styleFor(feature));
        },
        click: (e: L.LeafletMouseEvent) => {
          showDetail(feature);
          L.popup()
            .setLatLng(e.latlng)
            .setContent(renderDetail(snapshot, featureIso3(feature), featureName(feature), filter))
            .openOn(map);
        },
      });
    },
  }).addTo(map);

  const applyFilter = (next: Filter) => {
    filter = next;
    scale = colorScale(snapshot, filter);
    layer.setStyle(styleFor);
    legendEl.innerHTML = renderLegend(scale, filter);
    filtersEl.querySelectorAll<HTMLButtonElement>(".filter-btn").forEach(btn => {
      btn.classList.toggle("filter-active", btn.dataset.filter === filter);
    });
    writeFilterToUrl(filter);
  };

  filtersEl.querySelectorAll<HTMLButtonElement>(".filter-btn").forEach(btn => {
    btn.addEventListener("click", () => applyFilter(parseFilter(btn.dataset.filter ?? null)));
  });

  applyFilter(filter);
  detailEl.innerHTML = notice ? renderNotice(notice) : "Hover over a country to see its medals.";
}

async function init() {
  const { snapshot, geo, notice } = await loadMapData(getJson, { data: DATA_URL, geo: GEO_URL });
  console.log(`Loaded ${snapshot.countries.size} countries, ${geo?.features.length ?? 0} boundary features`);

  const coverage = renderCoverage(snapshot.metadata);
  if (coverage) coverageEl.textContent = coverage;

  if (geo) mountMap(snapshot, geo, readFilterFromUrl(), notice);
  else if (notice) detailEl.innerHTML = renderNotice(notice);
}

init().catch((error) => {
  detailEl.innerHTML = renderNotice("The map could not be started.");
  console.error(error);
});
