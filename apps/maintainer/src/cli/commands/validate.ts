import { loadSettings } from '../../config/settings.js'
import { createPipelineContext } from '../../pipeline/context.js'
import { runValidation } from '../../pipeline/validate.js'

export async function runValidateCommand(): Promise<number> {
  const settings = loadSettings()
  const context = createPipelineContext(settings, 'validate')

  const { report, passed } = await runValidation(context, { minValidPercentage: settings.minValidPercentage })
  if (!report) {
    console.error('No certifications found to validate')
    return 1
  }

  const { summary } = report
  console.log(`Valid: ${summary.valid}/${summary.total_checked} (${summary.valid_percentage}%)`)
  console.log(`Invalid: ${summary.invalid}`)
  if (!passed) {
    console.error(`Valid share is below ${settings.minValidPercentage}%`)
    return 1
  }
  return 0
}
