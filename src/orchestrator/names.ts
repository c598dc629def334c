/** Word lists for random agent names. */
export const ADJECTIVES: readonly string[] = [
  'amber', 'ardent', 'balmy', 'bold', 'brave', 'breezy', 'bright', 'brisk', 'calm', 'candid',
  'clever', 'cosmic', 'crisp', 'daring', 'deft', 'eager', 'earnest', 'fabled', 'fair', 'fleet',
  'gentle', 'gleaming', 'hardy', 'hazy', 'jolly', 'keen', 'lively', 'lucid', 'mellow', 'merry',
  'misty', 'nimble', 'noble', 'patient', 'placid', 'quiet', 'rapid', 'rustic', 'serene', 'silent',
  'snug', 'spry', 'steady', 'stoic', 'sturdy', 'sunny', 'swift', 'tidal', 'tranquil', 'trusty',
  'vivid', 'wandering', 'wary', 'witty', 'zesty',
];

export const NOUNS: readonly string[] = [
  'albatross', 'anchor', 'atoll', 'beacon', 'bollard', 'bosun', 'breaker', 'buoy', 'capstan',
  'channel', 'clipper', 'compass', 'corsair', 'cove', 'current', 'cutter', 'dinghy', 'dock',
  'estuary', 'ferry', 'fjord', 'galley', 'gull', 'harbor', 'helm', 'inlet', 'jetty', 'keel',
  'ketch', 'lagoon', 'lantern', 'lighthouse', 'mariner', 'mooring', 'narwhal', 'otter', 'pelican',
  'pier', 'puffin', 'quay', 'reef', 'rudder', 'schooner', 'seal', 'shoal', 'skiff', 'sloop',
  'sounding', 'spinnaker', 'tern', 'tide', 'trawler', 'wharf', 'whale', 'yawl',
];
