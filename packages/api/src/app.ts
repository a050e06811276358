import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { Config, Logger } from '@quill/shared';
import type { ViralityService } from '@quill/virality';
import type { ContentService } from '@quill/generator';
import { errorHandler, requireApiKey } from './middleware.js';
import {
  blogRequestSchema,
  campaignRequestSchema,
  contentRewriteRequestSchema,
  expandRequestSchema,
  hooksRequestSchema,
  newsletterRequestSchema,
  outlineRequestSchema,
  postsRequestSchema,
  rewriteRequestSchema,
  scoreRequestSchema,
  shortenRequestSchema,
} from './schemas.js';
import {
  serializeBlog,
  serializeCampaign,
  serializeContentRewrite,
  serializeExpand,
  serializeNewsletter,
  serializePosts,
  serializeRewrite,
  serializeScore,
  serializeShorten,
} from './serializers.js';

/** JSON API over the virality engines and the content service. */

export interface AppDeps {
  config: Pick<Config, 'appName' | 'environment' | 'apiKeyEnabled' | 'apiKey'>;
  logger: Logger;
  virality: ViralityService;
  content: ContentService;
}

type Handler = (req: Request, res: Response) => unknown;

/** Forwards sync throws and async rejections to the error handler */
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

export function createApp({ config, logger, virality, content }: AppDeps) {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  // ─── Health ───

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      app: config.appName,
      environment: config.environment,
      generator: content.generatorName,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api', requireApiKey(config));

  // ─── Virality ───

  app.post(
    '/api/virality/score',
    route((req, res) => {
      const body = scoreRequestSchema.parse(req.body);
      res.json(serializeScore(virality.score(body.text, body.platform)));
    }),
  );

  app.post(
    '/api/virality/rewrite',
    route((req, res) => {
      const body = rewriteRequestSchema.parse(req.body);
      res.json(serializeRewrite(virality.rewrite(body.text, body.target_platform)));
    }),
  );

  // ─── Content ───

  app.post(
    '/api/content/blog',
    route(async (req, res) => {
      const body = blogRequestSchema.parse(req.body);
      res.json(serializeBlog(await content.generateBlog(body.topic, body.style_profile ?? {})));
    }),
  );

  app.post(
    '/api/content/outline',
    route(async (req, res) => {
      const body = outlineRequestSchema.parse(req.body);
      res.json(await content.generateOutline(body.topic, body.sections));
    }),
  );

  app.post(
    '/api/content/newsletter',
    route(async (req, res) => {
      const body = newsletterRequestSchema.parse(req.body);
      res.json(serializeNewsletter(await content.generateNewsletter(body.subject, body.topics, body.tone)));
    }),
  );

  app.post(
    '/api/content/posts',
    route(async (req, res) => {
      const body = postsRequestSchema.parse(req.body);
      const { posts } = await content.generateSocialPosts(body.topic, body.platforms, body.include_hooks);
      res.json(serializePosts(posts));
    }),
  );

  app.post(
    '/api/content/hooks',
    route(async (req, res) => {
      const body = hooksRequestSchema.parse(req.body);
      const hooks = await content.generateHooks(body.topic, body.count, body.platform ?? undefined);
      res.json({ topic: body.topic, hooks });
    }),
  );

  app.post(
    '/api/content/campaign',
    route(async (req, res) => {
      const body = campaignRequestSchema.parse(req.body);
      res.json(serializeCampaign(await content.generateCampaign(body.goal, body.steps, body.audience ?? undefined)));
    }),
  );

  app.post(
    '/api/content/expand',
    route(async (req, res) => {
      const body = expandRequestSchema.parse(req.body);
      res.json(serializeExpand(await content.expand(body.text, body.target_length)));
    }),
  );

  app.post(
    '/api/content/shorten',
    route(async (req, res) => {
      const body = shortenRequestSchema.parse(req.body);
      res.json(serializeShorten(await content.shorten(body.text, body.target_length ?? undefined)));
    }),
  );

  app.post(
    '/api/content/rewrite',
    route(async (req, res) => {
      const body = contentRewriteRequestSchema.parse(req.body);
      res.json(serializeContentRewrite(await content.rewrite(body.text, body.instructions)));
    }),
  );

  app.use(errorHandler(logger));

  return app;
}
