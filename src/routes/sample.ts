import { Router, Request, Response } from 'express';
import { getConfig } from '../config';
import { buildNode, measureDepth, SampleRequestSchema, supportedDimensions } from '../graph';
import { EmptyLayerStackError, UnsupportedDimensionError, type NoiseFn, type Point } from '../noise';

const router = Router();

function isConstructionFault(error: unknown): error is Error {
  return error instanceof EmptyLayerStackError
    || error instanceof UnsupportedDimensionError
    || error instanceof RangeError;
}

router.post('/', (req: Request, res: Response) => {
  const config = getConfig();

  const parsed = SampleRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({
      error: 'Invalid sample request',
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.') || 'root',
        message: issue.message,
      })),
    });
    return;
  }

  const { graph, points } = parsed.data;
  const { maxPointsPerRequest, maxGraphDepth } = config.sampling;

  if (points.length > maxPointsPerRequest) {
    res.status(400).json({ error: `Too many points: ${points.length} (limit ${maxPointsPerRequest})` });
    return;
  }

  const depth = measureDepth(graph);
  if (depth > maxGraphDepth) {
    res.status(400).json({ error: `Graph too deep: ${depth} levels (limit ${maxGraphDepth})` });
    return;
  }

  const dimensions = points[0].length;
  if (points.some((point) => point.length !== dimensions)) {
    res.status(400).json({ error: 'All points must have the same number of coordinates' });
    return;
  }

  const supported = supportedDimensions(graph);
  if (!supported.includes(dimensions)) {
    res.status(400).json({
      error: `Graph cannot be evaluated on ${dimensions}D points`,
      supportedDimensions: supported,
    });
    return;
  }

  try {
    const node: NoiseFn<Point> = buildNode(graph, { defaultSeed: config.noise.defaultSeed });
    const values = points.map((point) => node.get(point));

    if (config.derived.debug) {
      console.log(`[Sample] ${graph.type} graph, depth ${depth}, ${values.length} ${dimensions}D points`);
    }

    res.status(200).json({ dimensions, count: values.length, values });
  } catch (error) {
    if (isConstructionFault(error)) {
      res.status(400).json({ error: error.message });
      return;
    }

    console.error('[Sample] Evaluation failed:', error);
    res.status(500).json({ error: 'Internal server error' });
  }
});

export default router;
