import fetch from 'node-fetch';
import type { HttpGet } from './types.js';

export const nodeFetchGet: HttpGet = async (url) => {
  const response = await fetch(url, {
    method: 'GET',
    headers: {
      'Accept': 'application/json',
    },
  });
  return { status: response.status, body: await response.text() };
};

export const getUrl = (baseUrl: string, path: string): string =>
  baseUrl.endsWith('/') ? `${baseUrl}${path}` : `${baseUrl}/${path}`;
