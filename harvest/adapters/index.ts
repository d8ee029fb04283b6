import { imo } from "./imo.ingest.js";
import { ioi } from "./ioi.ingest.js";
import { ipho } from "./ipho.ingest.js";
import type { OlympiadAdapter } from "../adapter.types.js";

export const adapters: OlympiadAdapter[] = [imo, ioi, ipho];
