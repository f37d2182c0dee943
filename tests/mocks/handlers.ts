/**
 * MSW Request Handlers
 *
 * Default responses for the search providers, the media service and the CMS.
 * Tests override these per case with `server.use(...)`.
 */

import { http, HttpResponse } from 'msw';

export const MEDIA_SERVICE_URL = 'http://media.test';
export const CMS_BASE_URL = 'http://cms.test';

export const MOCK_TAVILY_RESPONSE = {
  results: [
    {
      title: 'Brewing ratios explained',
      url: 'https://coffee-notes.example.com/ratios',
      content: 'A 1:16 coffee to water ratio is a common starting point for filter brewing.',
      score: 0.91,
    },
    {
      title: 'Grind size guide',
      url: 'https://grindlab.example.org/guide',
      content: 'Finer grinds extract faster; adjust grind before changing the dose.',
      score: 0.84,
    },
  ],
  images: ['https://images.example.net/beans.jpg', 'https://images.example.net/kettle.png'],
};

export const MOCK_EXA_RESPONSE = {
  results: [
    {
      title: 'Water temperature for pour-over',
      url: 'https://brewscience.example.com/temperature',
      text: 'Most guides recommend water between 90 and 96 degrees Celsius.',
    },
  ],
};

export const MOCK_DUCKDUCKGO_HTML = `<!DOCTYPE html>
<html><body>
  <div class="result">
    <a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fkettles.example.com%2Freview&rut=abc">Kettle review</a>
    <a class="result__snippet">Gooseneck kettles give steadier pours.</a>
  </div>
</body></html>`;

export const handlers = [
  http.post('https://api.tavily.com/search', () => HttpResponse.json(MOCK_TAVILY_RESPONSE)),

  http.post('https://api.exa.ai/search', () => HttpResponse.json(MOCK_EXA_RESPONSE)),

  http.get('https://html.duckduckgo.com/html/', () =>
    new HttpResponse(MOCK_DUCKDUCKGO_HTML, { headers: { 'content-type': 'text/html' } })
  ),

  http.post(`${MEDIA_SERVICE_URL}/process`, async ({ request }) => {
    const body: unknown = await request.json();
    const source =
      typeof body === 'object' && body !== null && 'image_url' in body ? String(body.image_url) : '';
    const name = source.split('/').pop() ?? 'image.jpg';
    return HttpResponse.json({ processed_url: `https://cdn.example.com/media/${name}` });
  }),

  http.post(`${CMS_BASE_URL}/wp-json/thirdparty/v1/create-post`, () =>
    HttpResponse.json({ success: true, post_id: 101 })
  ),
];
