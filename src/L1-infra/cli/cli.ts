import { Command, InvalidArgumentError, Option } from 'commander'

export { Command, InvalidArgumentError, Option }
