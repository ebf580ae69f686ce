import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { PLACEHOLDER_BODY } from '../templates/TemplateEngine.js';
import { ROUTER_OPTIONS, sendRendered, summarize, type RouterContext } from './context.js';

const XML = 'application/xml';

/**
 * Device and service descriptors fetched by discovering clients, plus the
 * endpoints an XML parser only reaches by resolving external entities.
 */
export function createDescriptorRouter({ log, templates }: RouterContext): Router {
  const router = Router(ROUTER_OPTIONS);

  router.all(
    '/ssdp/device-desc.xml',
    asyncHandler(async (req, res) => {
      log.request('XML_REQUEST', summarize(req));
      await sendRendered(res, log, 'device XML', XML, () =>
        templates.renderDeviceDescriptor(),
      );
    }),
  );

  router.all(
    '/ssdp/service-desc.xml',
    asyncHandler(async (req, res) => {
      log.request('XML_REQUEST', summarize(req));
      await sendRendered(res, log, 'service XML', XML, () =>
        templates.renderServiceDescriptor(),
      );
    }),
  );

  router.all('/ssdp/xxe.html', (req, res) => {
    log.request('XXE', summarize(req));
    res.status(200).type(XML).send(PLACEHOLDER_BODY);
  });

  router.all(
    '/ssdp/data.dtd',
    asyncHandler(async (req, res) => {
      log.request('XXE', summarize(req));
      await sendRendered(res, log, 'exfil DTD', XML, () => templates.renderExfilDtd());
    }),
  );

  return router;
}
