export { extractPlate, isValidPlate } from './normalize'
export { PlateDebouncer, type PlateDebouncerOptions } from './debounce'
