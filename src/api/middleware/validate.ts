import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationChain } from 'express-validator';

/**
 * Runs the given express-validator chains and answers 400 with one
 * "<field>: <message>" line per problem, the same detail shape batch
 * payload validation uses.
 */
export function validate(validations: ValidationChain[]) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await Promise.all(validations.map((v) => v.run(req)));
    const errors = validationResult(req);
    if (errors.isEmpty()) {
      next();
      return;
    }
    const details = errors.array().map((e) => (e.type === 'field' ? `${e.path}: ${String(e.msg)}` : String(e.msg)));
    res.status(400).json({ error: 'Validation failed', details });
  };
}
