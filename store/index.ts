import pool from "../config/db";

import { PgCountryStore } from "./pgCountryStore";

export type { CountryStore, CountryWriter } from "./countryStore";

export const countryStore = new PgCountryStore(pool);
