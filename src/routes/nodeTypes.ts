import { Router, Request, Response } from 'express';
import { listNodeTypes } from '../graph';

const router = Router();

router.get('/', (req: Request, res: Response) => {
  const nodeTypes = listNodeTypes();

  res.status(200).json({
    count: nodeTypes.length,
    nodeTypes,
  });
});

export default router;
