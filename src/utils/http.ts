import logger, { httpLogger } from "@/logger";
import axios from "axios";
import axiosRetry, { isNetworkError } from "axios-retry";
import throttledQueue from "throttled-queue";

const REQUESTS_PER_SECOND = process.env.HTTP_REQUESTS_PER_SECOND
  ? parseInt(process.env.HTTP_REQUESTS_PER_SECOND)
  : 10;

const throttle = throttledQueue(REQUESTS_PER_SECOND > 0 ? REQUESTS_PER_SECOND : 10, 1000);

const instance = axios.create({
  timeout: 15000,
  headers: {
    "Content-Type": "application/json",
  },
});

// probes are time-boxed by the caller, so only retry quick network failures
axiosRetry(instance, {
  retries: 2,
  retryDelay: (retryCount) => retryCount * 500,
  retryCondition: (error) => isNetworkError(error),
  onRetry: (retryCount, error) => {
    logger.warn("[HTTP]", `request failed, retry #${retryCount}: ${error.message}`);
  },
});

instance.interceptors.request.use(async (config) => {
  await throttle(() => undefined);

  config.headers["User-Agent"] =
    config.headers["User-Agent"] ||
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/132.0.0.0 Safari/537.36";
  config.headers["Referer"] = config.headers["Referer"] || "https://www.tiktok.com/";

  return config;
});

instance.interceptors.request.use(
  (config) => {
    httpLogger.info("Sending request", {
      method: config.method,
      url: config.url,
      params: config.params,
      timeout: config.timeout,
    });
    return config;
  },
  (error) => {
    httpLogger.error(error);
    return Promise.reject(error);
  }
);

instance.interceptors.response.use(
  (response) => {
    httpLogger.info("Received response", {
      method: response.config.method,
      url: response.config.url,
      status: response.status,
    });
    return response;
  },
  (error) => {
    httpLogger.error(axios.isAxiosError(error) ? `${error.config?.url} -> ${error.message}` : error);
    return Promise.reject(error);
  }
);

export default instance;
