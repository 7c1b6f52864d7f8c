import type { BrambleRequest, BrambleResponse } from '../../../../../framework/mod.ts';

export default function blog(_req: BrambleRequest, res: BrambleResponse): void {
  res.header('X-Feature', 'blog');
}
