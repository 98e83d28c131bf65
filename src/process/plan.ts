// Decoder for the build plan cabal writes to dist-newstyle/cache/plan.json.
// Only the fields needed to locate built executables are modelled; the rest of
// each install-plan entry is dropped.
import fs from 'fs/promises';
import { z } from 'zod';
import { HarnessError, HarnessErrorCode, errorMessage } from '../shared/errors.js';

const componentSchema = z.object({
  'component-name': z.string().optional(),
  'bin-file': z.string().optional(),
});

const planSchema = z.object({
  'install-plan': z.array(componentSchema),
});

export type BuildPlanComponent = z.infer<typeof componentSchema>;
export type BuildPlan = z.infer<typeof planSchema>;

export function decodeBuildPlan(contents: string): BuildPlan {
  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (err) {
    throw new HarnessError(HarnessErrorCode.PLAN_DECODE_FAILED, `Cannot decode plan: ${errorMessage(err)}`);
  }
  const parsed = planSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new HarnessError(HarnessErrorCode.PLAN_DECODE_FAILED, `Cannot decode plan: ${detail}`);
  }
  return parsed.data;
}

export async function readBuildPlan(planPath: string): Promise<BuildPlan> {
  let contents: string;
  try {
    contents = await fs.readFile(planPath, 'utf-8');
  } catch (err) {
    throw new HarnessError(HarnessErrorCode.PLAN_UNREADABLE, `Cannot read plan: ${planPath}`, {
      cause: errorMessage(err),
    });
  }
  return decodeBuildPlan(contents);
}

export function findExecutable(plan: BuildPlan, packageName: string): BuildPlanComponent | undefined {
  const wanted = `exe:${packageName}`;
  return plan['install-plan'].find(component => component['component-name'] === wanted);
}
