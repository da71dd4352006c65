import { config } from "@/config";
import axios from "axios";
import Bottleneck from "bottleneck";

export const GRAPH_API_HOST = "https://graph.facebook.com";

/**
 * Axios instance for the Graph API. Error responses are resolved rather than
 * thrown so the caller can inspect the error payload.
 */
export const createGraphHttpClient = () =>
  axios.create({
    timeout: 30_000,
    validateStatus: () => true,
  });

export const createGraphLimiter = (
  minTime = config.facebook.minRequestIntervalMs
) =>
  new Bottleneck({
    maxConcurrent: 1,
    minTime,
  });
