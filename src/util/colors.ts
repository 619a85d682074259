export type RGBTuple = [ number, number, number ];


const validChannel = (value: number): boolean =>
    Number.isInteger(value) && value >= 0 && value <= 255;


export class RGB {

    public readonly red: number;
    public readonly green: number;
    public readonly blue: number;

    public constructor(rgb24Integer: number);
    public constructor(red: number, green: number, blue: number);
    public constructor(arg0: number, green?: number, blue?: number) {
        let red = arg0;

        if(green === undefined || blue === undefined) {
            arg0 >>>= 0;
            blue = arg0 & 0xFF;
            green = (arg0 & 0xFF00) >>> 8;
            red = (arg0 & 0xFF0000) >>> 16;
        }

        if(!validChannel(red) || !validChannel(green) || !validChannel(blue)) {
            throw new RangeError(`Invalid RGB color (${red}, ${green}, ${blue}), ` +
                `channels must be integers between 0 and 255.`);
        }

        this.red = red;
        this.green = green;
        this.blue = blue;
    }

    public static fromTuple([ red, green, blue ]: RGBTuple): RGB {
        return new RGB(red, green, blue);
    }

    /**
     * Exact channel comparison, no tolerance is applied.
     */
    public equals(other: RGB): boolean {
        if(this.red !== other.red) {
            return false;
        }
        if(this.green !== other.green) {
            return false;
        }
        return this.blue === other.blue;
    }

    public matches(red: number, green: number, blue: number): boolean {
        return this.red === red && this.green === green && this.blue === blue;
    }

    public toTuple(): RGBTuple {
        return [ this.red, this.green, this.blue ];
    }

    public get rgb24(): number {
        return ((this.red << 16) | (this.green << 8) | this.blue) >>> 0;
    }

    public toString(): string {
        return `#${this.rgb24.toString(16).padStart(6, '0')}`;
    }

}
