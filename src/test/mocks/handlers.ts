import { http, HttpResponse } from 'msw';
import { REMOTE_ENDPOINTS } from '../../config';

/**
 * In-process stand-in for a healthy remote service
 */
export const REMOTE_BASE = 'http://remote.test';

export const mockBoxes = [
  { id: 'box-1', name: 'Living Room' },
  { id: 'box-2', name: 'Kids Room' },
];

export const handlers = [
  http.get(`${REMOTE_BASE}${REMOTE_ENDPOINTS.catalog}`, () => {
    return HttpResponse.json([]);
  }),

  http.get(`${REMOTE_BASE}${REMOTE_ENDPOINTS.boxes}`, () => {
    return HttpResponse.json(mockBoxes);
  }),
];
