import type { ServiceModule } from '../../types/service';
import { lexicalaModule } from './lexicala/LexicalaDictionary';
import { yandexModule } from './yandex/YandexDictionary';

export const SERVICE_MODULES: readonly ServiceModule[] = [yandexModule, lexicalaModule];
