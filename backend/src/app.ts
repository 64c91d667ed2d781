import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { ReviewAnalyzer } from './analysis/analyzer';
import { CapabilityHandle } from './analysis/capabilities';
import { listCategories } from './analysis/complaintCategories';
import { errorMessage, RequestValidationError } from './errors';
import { streamReportPdf } from './pdf/reportPdf';
import {
  buildProductDocument,
  complaintView,
  productDocumentKey,
  productSummary,
} from './storage/documents';
import { ProductStore } from './storage/productStore';
import { logger as rootLogger, Logger } from './utils/logger';

const PRODUCT_LIST_LIMIT = 50;

// Missing fields are filled from fallbackProductInfo when the document is built.
const productInfoSchema = z
  .object({
    name: z.string(),
    rating: z.number().min(0).max(5),
    review_count: z.number().int().nonnegative(),
    original_rating_distribution: z.record(z.number()),
  })
  .partial();

const analyzeReviewsSchema = z.object({
  reviews: z.array(z.string().nullable()),
  product_info: productInfoSchema.nullish(),
  product_id: z.union([z.string().min(1), z.number()]).transform(String).nullish(),
  retailer: z.string().min(1).nullish(),
});

const analyzeTextSchema = z.object({
  text: z.string(),
  threshold: z.number().min(0).max(1).optional(),
});

type ProductParams = {
  retailer: string;
  productId: string;
};

export type AppDependencies = {
  analyzer: ReviewAnalyzer;
  capabilities: CapabilityHandle;
  store: ProductStore;
  defaultThreshold: number;
  logger?: Logger;
  now?: () => Date;
};

function parseBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new RequestValidationError(
      'Invalid request body.',
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`,
      ),
    );
  }
  return parsed.data;
}

export function createApp(deps: AppDependencies) {
  const log = deps.logger ?? rootLogger.child('http');
  const now = deps.now ?? (() => new Date());
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '2mb' }));

  const fail = (res: Response, code: string, err: unknown) => {
    if (err instanceof RequestValidationError) {
      return res.status(400).json({
        error: 'INVALID_REQUEST',
        message: err.message,
        issues: err.issues,
      });
    }
    log.error(`${code}: ${errorMessage(err)}`);
    return res.status(500).json({ error: code, message: errorMessage(err) });
  };

  const notFound = (res: Response, message: string) =>
    res.status(404).json({ error: 'NOT_FOUND', message });

  const loadDocument = (params: ProductParams) =>
    deps.store.get(productDocumentKey(params.retailer, params.productId));

  app.post('/api/analyze-reviews', async (req: Request, res: Response) => {
    try {
      const body = parseBody(analyzeReviewsSchema, req.body);
      const run = await deps.analyzer.analyzeReviews(body.reviews);

      let documentKey: string | undefined;
      if (body.product_id && body.retailer) {
        const document = buildProductDocument({
          retailer: body.retailer,
          productId: body.product_id,
          productInfo: body.product_info ?? undefined,
          run,
          now: now(),
        });
        await deps.store.upsert(document.document_key, document);
        documentKey = document.document_key;
        log.info(
          `Saved ${document.document_key} with ${run.complaintReviews.length} complaint reviews`,
        );
      }

      return res.json({
        status: run.status,
        analysis: run.analysis,
        complaint_reviews: run.complaintReviews,
        document_key: documentKey,
      });
    } catch (err) {
      return fail(res, 'ANALYSIS_FAILED', err);
    }
  });

  app.get(
    '/api/product/:retailer/:productId',
    async (req: Request<ProductParams>, res: Response) => {
      try {
        const document = await loadDocument(req.params);
        if (!document) return notFound(res, 'Product not found.');
        return res.json(document);
      } catch (err) {
        return fail(res, 'STORE_FAILED', err);
      }
    },
  );

  app.get(
    '/api/sentiment-analysis/:retailer/:productId',
    async (req: Request<ProductParams>, res: Response) => {
      try {
        const document = await loadDocument(req.params);
        if (!document) return notFound(res, 'Product not found.');
        return res.json(document.analysis);
      } catch (err) {
        return fail(res, 'STORE_FAILED', err);
      }
    },
  );

  app.get(
    '/api/complaint-analysis/:retailer/:productId',
    async (req: Request<ProductParams>, res: Response) => {
      try {
        const document = await loadDocument(req.params);
        if (!document) return notFound(res, 'Product not found.');
        return res.json(complaintView(document));
      } catch (err) {
        return fail(res, 'STORE_FAILED', err);
      }
    },
  );

  app.get('/api/complaints/categories', (_req, res) => {
    res.json(listCategories());
  });

  app.post('/api/complaints/analyze-text', async (req: Request, res: Response) => {
    try {
      const body = parseBody(analyzeTextSchema, req.body);
      const threshold = body.threshold ?? deps.defaultThreshold;
      const complaints = await deps.analyzer.analyzeText(body.text, threshold);
      return res.json({
        text: body.text,
        threshold,
        complaints_found: complaints,
        total_complaints: Object.keys(complaints).length,
        analysis_timestamp: now().getTime() / 1000,
      });
    } catch (err) {
      return fail(res, 'ANALYSIS_FAILED', err);
    }
  });

  app.get('/api/products', async (_req: Request, res: Response) => {
    try {
      const documents = await deps.store.list(PRODUCT_LIST_LIMIT);
      const products = documents.map(productSummary);
      return res.json({ products, total_count: products.length });
    } catch (err) {
      return fail(res, 'STORE_FAILED', err);
    }
  });

  app.get(
    '/api/report/:retailer/:productId/pdf',
    async (req: Request<ProductParams>, res: Response) => {
      try {
        const document = await loadDocument(req.params);
        if (!document) return notFound(res, 'Product not found.');
        streamReportPdf(res, document);
      } catch (err) {
        return fail(res, 'PDF_FAILED', err);
      }
    },
  );

  app.get('/health', (_req, res) => {
    res.json({
      ok: true,
      advanced_analysis_available: deps.capabilities.status.zeroShotClassifier,
    });
  });

  // Malformed JSON bodies surface here from express.json().
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    if (err instanceof SyntaxError) {
      return res
        .status(400)
        .json({ error: 'INVALID_REQUEST', message: 'Malformed JSON body.' });
    }
    return fail(res, 'INTERNAL_ERROR', err);
  });

  return app;
}
