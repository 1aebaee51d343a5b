export { ChannelLookupDto } from './channel-lookup.dto';
