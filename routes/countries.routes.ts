import express from "express";

import {
  deleteCountryByName,
  getAllCountries,
  getCountryByName,
  getStatus,
  getSummaryImage,
  refreshData,
} from "../controllers/countries.controller";

const router = express.Router();

router.get("/countries", getAllCountries);
router.post("/countries/refresh", refreshData);

router.get("/status", getStatus);
router.get("/countries/image", getSummaryImage);

// after /countries/image so "image" is never read as a name
router.get("/countries/:name", getCountryByName);
router.delete("/countries/:name", deleteCountryByName);

export default router;
