import { Layer } from "effect";
import { KasaOutletDriverLayer } from "./outlet-driver/kasa.outlet-driver.js";

export const serviceLayers = Layer.mergeAll(
    KasaOutletDriverLayer,
);
