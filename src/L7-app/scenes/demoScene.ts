import { at, hstack, resource, zstack } from '../../L0-pure/composition/builder.js'
import type { Composable, Video } from '../../L0-pure/composition/builder.js'

/**
 * One panel of the demo: a talk recording with an archive clip picture-in-picture
 * and, optionally, a logo bug.
 */
export class KeynotePanel implements Video {
  constructor(private readonly showLogo: boolean) {}

  body(): Composable {
    return zstack(
      resource('keynote-2020.mp4'),
      resource('keynote-1990.mkv', at(1200, 100)),
      this.showLogo && resource('logo.png', at(100, 800)),
    )
  }
}

/** Two keynote panels side by side; only the right one carries the logo. */
export class SideBySideKeynotes implements Video {
  constructor(private readonly logoOnBothPanels = false) {}

  body(): Composable {
    return hstack(
      new KeynotePanel(this.logoOnBothPanels),
      new KeynotePanel(true),
    )
  }
}
