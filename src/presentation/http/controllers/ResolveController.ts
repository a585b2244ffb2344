import type { Request, Response } from 'express';
import type { ILogger } from '../../../domain/interfaces';
import type { ResolveStreamUseCase } from '../../../application/use-cases/ResolveStreamUseCase';
import { ErrorResponder } from '../utils/ErrorResponder';
import { requestSignal } from '../utils/requestSignal';
import { describeIssues, zStreamDescriptorBody } from '../schemas';
import { HTTP_STATUS } from '../constants/HttpConstants';

export interface ResolveControllerOptions {
    unlockEnabled: boolean;
    // Umbrella deadline for one resolution, unlock polling included
    resolveTimeoutMs: number;
}

/**
 * Controller for turning a stream descriptor into a playable URL
 */
export class ResolveController {
    constructor(
        private resolveStreamUseCase: ResolveStreamUseCase,
        private logger: ILogger,
        private options: ResolveControllerOptions
    ) { }

    /**
     * Handles GET /health
     */
    health(_req: Request, res: Response): void {
        res.json({ status: 'ok', unlockEnabled: this.options.unlockEnabled });
    }

    /**
     * Handles POST /resolve with a JSON stream descriptor
     */
    async resolve(req: Request, res: Response): Promise<void> {
        const body = zStreamDescriptorBody.safeParse(req.body);

        if (!body.success) {
            ErrorResponder.sendError(res, `Invalid stream descriptor: ${describeIssues(body.error)}`, HTTP_STATUS.BAD_REQUEST);
            return;
        }

        const { signal, dispose } = requestSignal(res, this.options.resolveTimeoutMs);
        try {
            const result = await this.resolveStreamUseCase.execute({
                descriptor: body.data,
                unlockEnabled: this.options.unlockEnabled,
                signal
            });

            if (!result.success) {
                res.status(HTTP_STATUS.NOT_FOUND).json({ error: result.error, code: result.code });
                return;
            }

            res.json({
                url: result.url,
                source: result.source,
                unlocked: result.unlocked,
                fallbackReason: result.fallbackReason
            });
        } catch (error) {
            ErrorResponder.handle(error, res, this.logger, 'resolve');
        } finally {
            dispose();
        }
    }
}
