import chalk from 'chalk'
import { withSystem } from '../utils/system'

export async function clearCache(): Promise<void> {
  await withSystem(async system => {
    const removed = await system.cache.clear()
    console.log(chalk.green(`Removed ${removed} cached series from ${system.config.storage.cacheDir}`))
  })
}
